/**
 * Error Taxonomy for the Digest Pipeline
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ERROR HIERARCHY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * PipelineError (base)
 * ├── ContentError  - one raw message cannot be normalized (skip it)
 * ├── ServiceError  - mailbox / reasoning-service call failed (retry, degrade)
 * ├── LedgerError   - the ledger store is unusable (fatal for the run)
 * └── ConfigError   - configuration or credentials missing (fatal at startup)
 *
 * Per-message errors (ContentError, ServiceError) never leave the message
 * loop. Run-level errors (LedgerError, ConfigError) propagate to the CLI,
 * which exits non-zero.
 *
 * @module lib/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Base error class for all pipeline errors.
 *
 * @example
 * ```typescript
 * try {
 *   await pipeline.run();
 * } catch (error) {
 *   if (error instanceof PipelineError) {
 *     logger.error('Run failed', { code: error.code, ...error.context });
 *   }
 * }
 * ```
 */
export class PipelineError extends Error {
  /** Machine-readable error code */
  public readonly code: string;

  /** Structured context for debugging */
  public readonly context: Record<string, unknown>;

  /** When the error occurred */
  public readonly timestamp: string;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Keeps the stack pointing at the throw site rather than this constructor
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * JSON-serializable view for logs and the CLI report.
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A raw message could not be normalized (missing id or payload, unreadable
 * body). The run skips the message and continues.
 */
export class ContentError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONTENT_ERROR', context);
    this.name = 'ContentError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Why a service call failed. Drives the retry decision.
 */
export type ServiceErrorKind =
  | 'network'
  | 'timeout'
  | 'rate_limit'
  | 'server'
  | 'auth'
  | 'request'
  | 'invalid_response';

const RETRYABLE_KINDS: ReadonlySet<ServiceErrorKind> = new Set([
  'network',
  'timeout',
  'rate_limit',
  'server',
]);

/**
 * A call to the mailbox or the reasoning service failed.
 *
 * @example
 * ```typescript
 * throw new ServiceError('Reasoning service timed out', 'timeout', {
 *   service: 'openai',
 *   timeoutMs: 45000,
 * });
 * ```
 */
export class ServiceError extends PipelineError {
  public readonly kind: ServiceErrorKind;

  /** Whether another attempt could succeed */
  public readonly retryable: boolean;

  /** HTTP status, when the failure came with one */
  public readonly statusCode?: number;

  constructor(
    message: string,
    kind: ServiceErrorKind,
    context: Record<string, unknown> = {},
    statusCode?: number
  ) {
    super(message, `SERVICE_${kind.toUpperCase()}`, context);
    this.name = 'ServiceError';
    this.kind = kind;
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.statusCode = statusCode;
  }
}

/**
 * Maps an HTTP status code onto a service error kind.
 */
export function kindFromStatus(statusCode: number): ServiceErrorKind {
  if (statusCode === 401 || statusCode === 403) return 'auth';
  if (statusCode === 408) return 'timeout';
  if (statusCode === 429) return 'rate_limit';
  if (statusCode >= 500) return 'server';
  return 'request';
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN-LEVEL ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The ledger store is unavailable (locked, unwritable, corrupt).
 * Idempotency cannot be guaranteed without it, so the run stops.
 */
export class LedgerError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'LEDGER_ERROR', context);
    this.name = 'LedgerError';
  }
}

/**
 * Required configuration or credentials are missing or invalid.
 * Raised before any processing starts.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Extracts a loggable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
