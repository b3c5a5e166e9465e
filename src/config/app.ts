/**
 * Application Configuration
 *
 * Process-level settings read from the environment. Everything that varies
 * per scope (labels, prompts, thresholds, storage) lives in the profile file
 * instead, see `config/profiles.ts`.
 *
 * Secrets are optional while parsing so `--stats` and `--help` work without
 * them; commands that talk to the mailbox or the reasoning service call
 * `requireCredentials()` first.
 */

import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

/**
 * Validate and parse environment variables with Zod.
 * Empty strings count as unset (a blank line in .env shouldn't pass).
 */
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  DIGEST_CONFIG_PATH: z.string().min(1).default('config/profiles.json'),
  DIGEST_PROFILE: z.string().min(1).optional(),
  OPENAI_API_KEY: optionalSecret,
  GMAIL_CLIENT_ID: optionalSecret,
  GMAIL_CLIENT_SECRET: optionalSecret,
  GMAIL_REFRESH_TOKEN: optionalSecret,
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses an environment record. Throws ConfigError listing every invalid
 * variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`, { problems });
  }
  return result.data;
}

/**
 * Credentials needed by a run that reaches external services.
 */
export interface Credentials {
  openaiApiKey: string;
  gmail: {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
  };
}

/**
 * Returns the credentials or throws ConfigError naming every missing
 * variable, before any processing starts.
 *
 * @example
 * ```typescript
 * const credentials = requireCredentials(loadEnv());
 * ```
 */
export function requireCredentials(env: AppEnv): Credentials {
  const { OPENAI_API_KEY, GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN } = env;

  if (!OPENAI_API_KEY || !GMAIL_CLIENT_ID || !GMAIL_CLIENT_SECRET || !GMAIL_REFRESH_TOKEN) {
    const missing = Object.entries({
      OPENAI_API_KEY,
      GMAIL_CLIENT_ID,
      GMAIL_CLIENT_SECRET,
      GMAIL_REFRESH_TOKEN,
    })
      .filter(([, value]) => !value)
      .map(([name]) => name);

    throw new ConfigError(`Missing required credentials: ${missing.join(', ')}`, { missing });
  }

  return {
    openaiApiKey: OPENAI_API_KEY,
    gmail: {
      clientId: GMAIL_CLIENT_ID,
      clientSecret: GMAIL_CLIENT_SECRET,
      refreshToken: GMAIL_REFRESH_TOKEN,
    },
  };
}
