#!/usr/bin/env npx tsx
/**
 * Digest Runner
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Run the default profile:
 *    npx tsx scripts/run-digest.ts
 *
 * 2. Run a specific profile, re-extracting everything in the lookback window:
 *    npx tsx scripts/run-digest.ts --profile=community --force
 *
 * 3. Ledger statistics only:
 *    npx tsx scripts/run-digest.ts --stats
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PREREQUISITES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Environment variables (not needed for --stats):
 *    - OPENAI_API_KEY
 *    - GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN
 *
 * Optional: DIGEST_CONFIG_PATH (default config/profiles.json), DIGEST_PROFILE,
 * LOG_LEVEL.
 *
 * SIGINT / SIGTERM cancel the in-flight service call and stop the run; the
 * interrupted message is not recorded and no digest is produced. Messages
 * finished before the signal join the next run's digest.
 *
 * @module scripts/run-digest
 */

import { main } from '@/cli/main';

const controller = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.error(`\n⚠️  ${signal} received, cancelling the current call and stopping (no digest this run)...`);
    controller.abort();
  });
}

main(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Fatal:', error);
    process.exitCode = 1;
  });
