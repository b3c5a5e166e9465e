/**
 * Command-line argument parsing.
 *
 * Accepts `--name=value` and `--name value`. Parsing never exits the
 * process; the caller decides what to print and which code to return.
 *
 * @module cli/parse-args
 */

export interface CliOptions {
  /** Profile to run; falls back to DIGEST_PROFILE, then the file's default */
  profile?: string;
  /** Profile file; falls back to DIGEST_CONFIG_PATH */
  configPath?: string;
  force: boolean;
  stats: boolean;
  help: boolean;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = `Usage: run-digest [options]

Options:
  --profile=<name>   Profile to run (default: DIGEST_PROFILE or the file's defaultProfile)
  --config=<path>    Profile file (default: DIGEST_CONFIG_PATH or config/profiles.json)
  --force            Re-extract messages the ledger has already processed
  --stats            Print ledger and digest statistics without running
  -h, --help         Show this help`;

const VALUE_FLAGS = { '--profile': 'profile', '--config': 'configPath' } as const;

function isValueFlag(name: string): name is keyof typeof VALUE_FLAGS {
  return name in VALUE_FLAGS;
}

/**
 * @example
 * ```typescript
 * parseArgs(['--profile', 'school', '--force']);
 * // { ok: true, options: { profile: 'school', force: true, stats: false, help: false } }
 * ```
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  const options: CliOptions = { force: false, stats: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (isValueFlag(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (!value || value.startsWith('--')) {
        return { ok: false, error: `${name} needs a value` };
      }
      options[VALUE_FLAGS[name]] = value;
      continue;
    }

    if (eq !== -1) {
      return { ok: false, error: `${name} does not take a value` };
    }

    switch (arg) {
      case '--force':
        options.force = true;
        break;
      case '--stats':
        options.stats = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  if (options.force && options.stats) {
    return { ok: false, error: '--force and --stats cannot be combined' };
  }

  return { ok: true, options };
}
