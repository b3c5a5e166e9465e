/**
 * Profile Configuration
 *
 * A profile is one isolated scope: its own mailbox label, prompt wording,
 * ledger store and output target. The profile file is JSON validated with
 * zod; every threshold has a default so a minimal profile only names what
 * differs.
 *
 * ```json
 * {
 *   "defaultProfile": "school",
 *   "profiles": {
 *     "school": {
 *       "label": "School",
 *       "prompts": { "scopeName": "elementary school", "audience": "parents" },
 *       "ledger": { "path": "data/school-ledger.db" },
 *       "output": { "directory": "digests/school" }
 *     }
 *   }
 * }
 * ```
 *
 * @module config/profiles
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { AI_MODELS } from '@/config/analyzers';
import { ConfigError, errorMessage } from '@/lib/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const promptsSchema = z.object({
  /** What the mail is about, e.g. "elementary school" or "homeowners association" */
  scopeName: z.string().min(1),
  /** Who reads the digest */
  audience: z.string().min(1).default('the household'),
  /** What to pay attention to */
  focus: z
    .string()
    .min(1)
    .default('events, deadlines, things to bring or sign, and schedule changes'),
  extraExtractionInstructions: z.string().optional(),
  extraDigestInstructions: z.string().optional(),
});

const processingSchema = z.object({
  bodyCharLimit: z.number().int().positive().default(8000),
  attachmentCharLimit: z.number().int().positive().default(4000),
  minImageWidth: z.number().int().nonnegative().default(100),
  minImageHeight: z.number().int().nonnegative().default(100),
  maxImageBytes: z.number().int().positive().default(5 * 1024 * 1024),
  processAttachments: z.boolean().default(true),
});

const aiSchema = z.object({
  model: z.enum(AI_MODELS).default('gpt-4.1-mini'),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(2000),
  digestMaxTokens: z.number().int().positive().default(800),
  timeoutMs: z.number().int().positive().default(45000),
  excerptChars: z.number().int().positive().default(500),
  digestInputChars: z.number().int().positive().default(15000),
});

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(10000),
  jitterRatio: z.number().min(0).max(1).default(0.3),
});

const ledgerSchema = z.object({
  path: z.string().min(1),
  retentionDays: z.number().int().positive().default(30),
});

const outputSchema = z.object({
  directory: z.string().min(1),
  filenamePattern: z.string().min(1).default('{profile}-digest-{date}.pdf'),
});

const deliverySchema = z.object({
  enabled: z.boolean().default(false),
  recipient: z.string().email().optional(),
  subjectPattern: z.string().min(1).default('{profile} digest for {date}'),
});

const mailboxSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
});

export const profileSchema = z
  .object({
    /** Mailbox label whose messages this profile digests */
    label: z.string().min(1),
    lookbackHours: z.number().int().positive().default(72),
    prompts: promptsSchema,
    processing: processingSchema.default({}),
    ai: aiSchema.default({}),
    retry: retrySchema.default({}),
    ledger: ledgerSchema,
    output: outputSchema,
    delivery: deliverySchema.default({}),
    mailbox: mailboxSchema.default({}),
  })
  .refine((profile) => !profile.delivery.enabled || profile.delivery.recipient !== undefined, {
    message: 'delivery.recipient is required when delivery is enabled',
    path: ['delivery', 'recipient'],
  });

export const profileFileSchema = z.object({
  defaultProfile: z.string().min(1).optional(),
  profiles: z.record(z.string().min(1), profileSchema),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ProfileSettings = z.infer<typeof profileSchema>;
export type ProcessingConfig = ProfileSettings['processing'];
export type AIConfig = ProfileSettings['ai'];
export type PromptConfig = ProfileSettings['prompts'];

/**
 * One resolved profile, passed explicitly into every component.
 */
export interface ProfileConfig extends ProfileSettings {
  name: string;
}

export interface ProfileFile {
  defaultProfile?: string;
  profiles: Map<string, ProfileConfig>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validates parsed JSON. Relative ledger and output paths resolve against
 * `baseDir`. Two profiles sharing one ledger store is rejected.
 */
export function parseProfileFile(raw: unknown, baseDir: string): ProfileFile {
  const result = profileFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid profile configuration: ${problems.join('; ')}`, { problems });
  }

  const profiles = new Map<string, ProfileConfig>();
  const ledgerOwners = new Map<string, string>();

  for (const [name, settings] of Object.entries(result.data.profiles)) {
    const ledgerPath = path.resolve(baseDir, settings.ledger.path);
    const owner = ledgerOwners.get(ledgerPath);
    if (owner) {
      throw new ConfigError(`Profiles "${owner}" and "${name}" share the ledger store ${ledgerPath}`, {
        ledgerPath,
        profiles: [owner, name],
      });
    }
    ledgerOwners.set(ledgerPath, name);

    profiles.set(name, {
      ...settings,
      name,
      ledger: { ...settings.ledger, path: ledgerPath },
      output: { ...settings.output, directory: path.resolve(baseDir, settings.output.directory) },
    });
  }

  if (profiles.size === 0) {
    throw new ConfigError('Profile configuration defines no profiles');
  }
  if (result.data.defaultProfile && !profiles.has(result.data.defaultProfile)) {
    throw new ConfigError(`defaultProfile "${result.data.defaultProfile}" is not defined`, {
      available: [...profiles.keys()],
    });
  }

  return { defaultProfile: result.data.defaultProfile, profiles };
}

/**
 * Reads and validates the profile file at `filePath`.
 */
export function loadProfileFile(filePath: string): ProfileFile {
  const absolute = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolute, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read profile configuration at ${absolute}: ${errorMessage(error)}`, {
      path: absolute,
    });
  }

  return parseProfileFile(raw, path.dirname(absolute));
}

/**
 * Picks a profile by name, falling back to the file's default, then to the
 * only profile if there is exactly one.
 */
export function selectProfile(file: ProfileFile, name?: string): ProfileConfig {
  const available = [...file.profiles.keys()];
  const wanted = name ?? file.defaultProfile ?? (available.length === 1 ? available[0] : undefined);

  if (!wanted) {
    throw new ConfigError('No profile selected and no defaultProfile configured', { available });
  }

  const profile = file.profiles.get(wanted);
  if (!profile) {
    throw new ConfigError(`Unknown profile "${wanted}"`, { available });
  }
  return profile;
}
