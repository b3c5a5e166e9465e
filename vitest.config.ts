/**
 * Vitest Configuration for inbox-digest
 *
 * Node environment with the `@` path alias used throughout `src/`.
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    // The pipeline never touches a DOM
    environment: 'node',

    // Setup files run before each test file
    setupFiles: ['./vitest.setup.ts'],

    // Include test files
    include: ['src/**/*.{test,spec}.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
