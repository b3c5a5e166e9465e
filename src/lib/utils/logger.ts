/**
 * Centralized Logging Utility
 *
 * Structured logging for every stage of the digest pipeline.
 * All logs carry a `context` (which module/service) and, inside a run,
 * the active `profile`, so two profiles logging into the same stream
 * stay distinguishable.
 *
 * USAGE:
 * ```typescript
 * import { createLogger } from '@/lib/utils/logger';
 *
 * const logger = createLogger('ItemExtractor', { profile: 'school' });
 * logger.info('Extraction started', { messageId: '18c2f...' });
 * logger.error('Extraction failed', { error: err.message });
 * ```
 *
 * LOG LEVELS:
 * - debug: Detailed diagnostic info (not shown in production)
 * - info: Important events and state changes
 * - warn: Conditions that don't stop execution (skipped messages, fallbacks)
 * - error: Errors that need attention
 */

import pino from 'pino';

/**
 * LOG_LEVEL wins; otherwise production logs at info and everything else
 * at debug.
 */
function getLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  if (envLevel) return envLevel;

  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * pino-pretty for interactive runs. Production and test write raw JSON
 * (the pretty transport runs in a worker thread the test runner would
 * have to tear down).
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test') {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

/**
 * Base pino logger instance.
 * Not exported - use createLogger() so every line has a context.
 */
const baseLogger = pino({
  level: getLogLevel(),
  transport: getTransport(),
});

/**
 * Metadata that can be included with any log message.
 */
export interface LogMetadata {
  /** Mailbox message identifier */
  messageId?: string;
  /** Digest identifier */
  digestId?: string;
  /** Profile (scope) the run operates under */
  profile?: string;
  /** Error message for error logs */
  error?: string;
  /** Duration in milliseconds for performance logging */
  durationMs?: number;
  /** Token count for reasoning-service calls (cost tracking) */
  tokensUsed?: number;
  /** Estimated cost in USD for reasoning-service calls */
  estimatedCost?: number;
  /** Any additional metadata */
  [key: string]: unknown;
}

/**
 * Logger returned by createLogger().
 * `start` and `success` are info-level lines tagged with a phase so a run
 * can be followed step by step.
 */
export interface EnhancedLogger {
  debug: (message: string, meta?: LogMetadata) => void;
  info: (message: string, meta?: LogMetadata) => void;
  warn: (message: string, meta?: LogMetadata) => void;
  error: (message: string, meta?: LogMetadata) => void;
  start: (message: string, meta?: LogMetadata) => void;
  success: (message: string, meta?: LogMetadata) => void;
}

/**
 * Creates a contextual logger for a specific module/service.
 *
 * @param context - Name of the module/service (e.g., 'ContentNormalizer')
 * @param bindings - Fields attached to every line (typically `{ profile }`)
 *
 * @example
 * ```typescript
 * const logger = createLogger('DigestPipeline', { profile: 'hoa' });
 * logger.start('Run started', { force: false });
 * // {"context":"DigestPipeline","profile":"hoa","phase":"start","force":false,"msg":"Run started"}
 * ```
 */
export function createLogger(
  context: string,
  bindings: LogMetadata = {}
): EnhancedLogger {
  const log = baseLogger.child({ context, ...bindings });

  return {
    debug: (message: string, meta?: LogMetadata) => log.debug({ ...meta }, message),
    info: (message: string, meta?: LogMetadata) => log.info({ ...meta }, message),
    warn: (message: string, meta?: LogMetadata) => log.warn({ ...meta }, message),
    error: (message: string, meta?: LogMetadata) => log.error({ ...meta }, message),
    start: (message: string, meta?: LogMetadata) =>
      log.info({ phase: 'start', ...meta }, message),
    success: (message: string, meta?: LogMetadata) =>
      log.info({ phase: 'success', ...meta }, message),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// AI CALL LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

const aiLogger = createLogger('AI');

/**
 * Uniform lines for reasoning-service calls, so cost and latency can be
 * grepped across extractors and the consolidator.
 */
export const logAI = {
  callStart: (meta: { model: string; purpose: string; messageId?: string }) =>
    aiLogger.debug('Reasoning call started', meta),

  callComplete: (meta: {
    model: string;
    purpose: string;
    messageId?: string;
    tokensUsed: number;
    estimatedCost: number;
    durationMs: number;
  }) => aiLogger.info('Reasoning call complete', meta),

  callError: (meta: { purpose: string; messageId?: string; error: string; attempts?: number }) =>
    aiLogger.error('Reasoning call failed', meta),
};

/**
 * Default logger for quick one-off logging.
 * Prefer createLogger() for service/module code.
 */
export const logger = createLogger('App');
