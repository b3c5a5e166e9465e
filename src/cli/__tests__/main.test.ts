/**
 * Tests for the CLI runner: exit codes, stats mode and error reporting.
 *
 * @module cli/__tests__/main.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LedgerError } from '@/lib/errors';
import type { RunOptions, RunReport } from '@/services/pipeline';
import { main, type CliDependencies } from '../main';
import { USAGE } from '../parse-args';

const CREDENTIALS = {
  OPENAI_API_KEY: 'test-secret',
  GMAIL_CLIENT_ID: 'test-client',
  GMAIL_CLIENT_SECRET: 'test-client-secret',
  GMAIL_REFRESH_TOKEN: 'test-refresh',
};

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    profile: 'school',
    force: false,
    aborted: false,
    startedAt: '2025-10-23T12:00:00.000Z',
    durationMs: 1500,
    candidates: 3,
    alreadyProcessed: 1,
    fetchFailures: 0,
    contentSkips: 0,
    extractedFull: 2,
    extractedFallback: 0,
    carriedOver: 0,
    digestId: 'digest-1',
    delivery: 'disabled',
    pruned: 0,
    tokensUsed: 300,
    estimatedCost: 0.003,
    errors: [],
    ...overrides,
  };
}

describe('main', () => {
  let dir: string;
  let configPath: string;
  let out: string[];
  let err: string[];

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'cli-test-'));
    configPath = path.join(dir, 'profiles.json');
    writeFileSync(
      configPath,
      JSON.stringify({
        defaultProfile: 'school',
        profiles: {
          school: {
            label: 'School',
            prompts: { scopeName: 'elementary school' },
            ledger: { path: 'school/ledger.db' },
            output: { directory: 'school/out' },
          },
          community: {
            label: 'HOA',
            prompts: { scopeName: 'homeowners association' },
            ledger: { path: 'community/ledger.db' },
            output: { directory: 'community/out' },
          },
        },
      })
    );
    out = [];
    err = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function deps(overrides: CliDependencies = {}): CliDependencies {
    return {
      env: { DIGEST_CONFIG_PATH: configPath, ...CREDENTIALS },
      out: (text) => out.push(text),
      err: (text) => err.push(text),
      ...overrides,
    };
  }

  it('prints usage and exits 0 for --help', async () => {
    expect(await main(['--help'], deps())).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('exits 1 on a usage error', async () => {
    expect(await main(['--verbose'], deps())).toBe(1);
    expect(err).toEqual([`❌ Unknown argument: --verbose\n\n${USAGE}`]);
  });

  it('prints statistics for a fresh ledger without credentials', async () => {
    const code = await main(['--stats'], deps({ env: { DIGEST_CONFIG_PATH: configPath } }));

    expect(code).toBe(0);
    expect(out[0]).toContain('  Ledger statistics: school');
    expect(out[0]).toContain('  Entries:             0');
  });

  it('runs the selected profile and prints the report', async () => {
    const report = makeReport({ profile: 'community', force: true });
    const run = vi.fn(async (_options?: RunOptions) => report);
    const close = vi.fn();
    const createPipeline = vi.fn(() => ({ pipeline: { run }, ledger: { close } }));

    const code = await main(['--config', configPath, '--force'], deps({
      env: { DIGEST_PROFILE: 'community', ...CREDENTIALS },
      createPipeline,
    }));

    expect(code).toBe(0);
    expect(createPipeline).toHaveBeenCalledWith(
      expect.objectContaining({ name: 'community', label: 'HOA' }),
      expect.objectContaining({ openaiApiKey: 'test-secret' })
    );
    expect(run).toHaveBeenCalledWith({ force: true, signal: undefined });
    expect(close).toHaveBeenCalledTimes(1);
    expect(out[0]).toContain('  Digest run: community (forced)');
    expect(out[0]).toContain('  Tokens / cost:       300 / $0.0030');
  });

  it('exits 1 before processing when credentials are missing', async () => {
    const createPipeline = vi.fn();

    const code = await main([], deps({ env: { DIGEST_CONFIG_PATH: configPath, OPENAI_API_KEY: 'test-secret' }, createPipeline }));

    expect(code).toBe(1);
    expect(createPipeline).not.toHaveBeenCalled();
    expect(err).toEqual([
      '❌ ConfigError: Missing required credentials: GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN',
    ]);
  });

  it('exits 1 for an unknown profile', async () => {
    expect(await main(['--profile=church'], deps())).toBe(1);
    expect(err).toEqual(['❌ ConfigError: Unknown profile "church"']);
  });

  it('reports progress when the ledger fails mid-run', async () => {
    const close = vi.fn();
    const failure = new LedgerError('disk I/O error', { progress: { succeeded: 2, degraded: 1, skipped: 0 } });
    const createPipeline = vi.fn(() => ({
      pipeline: { run: async (): Promise<RunReport> => Promise.reject(failure) },
      ledger: { close },
    }));

    const code = await main([], deps({ createPipeline }));

    expect(code).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
    expect(err).toEqual([
      '❌ LedgerError: disk I/O error',
      'Progress before failure: 2 succeeded, 1 degraded, 0 skipped',
    ]);
  });

  it('exits 1 on an unexpected failure', async () => {
    const createPipeline = vi.fn(() => {
      throw new Error('boom');
    });

    expect(await main([], deps({ createPipeline }))).toBe(1);
    expect(err).toEqual(['❌ Unexpected failure: boom']);
  });
});
