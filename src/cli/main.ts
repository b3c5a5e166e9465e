/**
 * CLI Runner
 *
 * Resolves configuration, then either prints ledger statistics (`--stats`) or
 * runs the pipeline for one profile. Returns the process exit code:
 *
 * - 0: the run completed (including zero new messages and per-message skips)
 * - 1: usage error, ConfigError, LedgerError or an unexpected failure
 *
 * @module cli/main
 */

import { z } from 'zod';
import { loadEnv, requireCredentials, type Credentials } from '@/config/app';
import { loadProfileFile, selectProfile, type ProfileConfig } from '@/config/profiles';
import { ConfigError, LedgerError, PipelineError, errorMessage } from '@/lib/errors';
import { LedgerStore, type Ledger } from '@/lib/ledger/ledger-store';
import { createLogger } from '@/lib/utils/logger';
import { createDigestPipeline, type DigestPipeline } from '@/services/pipeline';
import { formatProgress, formatReport, formatStats } from './format';
import { USAGE, parseArgs } from './parse-args';

const logger = createLogger('CLI');

const progressSchema = z.object({
  succeeded: z.number(),
  degraded: z.number(),
  skipped: z.number(),
});

export interface PipelineFactoryResult {
  pipeline: Pick<DigestPipeline, 'run'>;
  ledger: Pick<Ledger, 'close'>;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  out?: (text: string) => void;
  err?: (text: string) => void;
  createPipeline?: (profile: ProfileConfig, credentials: Credentials) => PipelineFactoryResult;
  openLedger?: (filePath: string) => Pick<Ledger, 'getStats' | 'close'>;
}

export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? ((text: string) => console.log(text));
  const err = deps.err ?? ((text: string) => console.error(text));

  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    err(`❌ ${parsed.error}\n\n${USAGE}`);
    return 1;
  }
  const { options } = parsed;
  if (options.help) {
    out(USAGE);
    return 0;
  }

  try {
    const env = loadEnv(deps.env);
    const file = loadProfileFile(options.configPath ?? env.DIGEST_CONFIG_PATH);
    const profile = selectProfile(file, options.profile ?? env.DIGEST_PROFILE);

    if (options.stats) {
      const ledger = (deps.openLedger ?? LedgerStore.open)(profile.ledger.path);
      try {
        out(formatStats(profile.name, ledger.getStats()));
      } finally {
        ledger.close();
      }
      return 0;
    }

    const credentials = requireCredentials(env);
    const { pipeline, ledger } = (deps.createPipeline ?? createDigestPipeline)(profile, credentials);
    try {
      const report = await pipeline.run({ force: options.force, signal: deps.signal });
      out(formatReport(report));
    } finally {
      ledger.close();
    }
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof LedgerError) {
      logger.error('Run stopped', error.toJSON());
      err(`❌ ${error.name}: ${error.message}`);
      const progress = progressSchema.safeParse(error.context.progress);
      if (progress.success) {
        err(formatProgress(progress.data));
      }
      return 1;
    }

    logger.error('Unexpected failure', {
      error: errorMessage(error),
      ...(error instanceof PipelineError ? { code: error.code } : {}),
    });
    err(`❌ Unexpected failure: ${errorMessage(error)}`);
    return 1;
  }
}
