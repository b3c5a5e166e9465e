/**
 * Bounded Retry with Exponential Backoff
 *
 * A call moves through `attempting(1) → attempting(2) → … → succeeded`
 * or ends in `degraded` once attempts run out or a non-retryable error
 * arrives. `runWithRetry` never throws for the operation's failures; it
 * returns the terminal state so callers can build their fallback.
 *
 * Sleep and randomness are injected so timing is testable without a
 * real clock.
 *
 * @module lib/utils/retry
 */

import { ServiceError, errorMessage } from '@/lib/errors';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Total attempts including the first (default 3) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs: number;
  /** Upper bound for the exponential part of the delay */
  maxDelayMs: number;
  /** Jitter added on top, as a fraction of the delay (0.3 = up to +30%) */
  jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterRatio: 0.3,
};

export type RetryState =
  | { status: 'attempting'; attempt: number }
  | { status: 'succeeded'; attempt: number }
  | { status: 'degraded'; attempt: number; error: Error };

export type RetryOutcome<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'degraded'; error: Error; attempts: number };

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  isRetryable?: (error: Error) => boolean;
  /** Called on every state transition */
  onStateChange?: (state: RetryState) => void;
  /** Called before sleeping between attempts */
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PURE HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Delay to wait after `failedAttempt` failed (1-based).
 *
 * base * 2^(failedAttempt-1), capped at maxDelayMs, plus jitter in
 * [0, jitterRatio * delay).
 *
 * @example
 * ```typescript
 * computeBackoffDelay(1, DEFAULT_RETRY_POLICY, () => 0); // 1000
 * computeBackoffDelay(2, DEFAULT_RETRY_POLICY, () => 0); // 2000
 * computeBackoffDelay(2, DEFAULT_RETRY_POLICY, () => 0.5); // 2300
 * ```
 */
export function computeBackoffDelay(
  failedAttempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, failedAttempt - 1));
  const delay = Math.min(exponential, policy.maxDelayMs);
  const jitter = random() * policy.jitterRatio * delay;
  return Math.round(delay + jitter);
}

/**
 * Service errors carry their own verdict; anything else (bugs, parse
 * failures inside the operation) is not retried.
 */
export function defaultIsRetryable(error: Error): boolean {
  return error instanceof ServiceError && error.retryable;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs `operation` until it succeeds, a non-retryable error occurs, or
 * the policy's attempts are exhausted.
 *
 * @example
 * ```typescript
 * const outcome = await runWithRetry(() => service.complete(request), policy);
 * if (outcome.status === 'degraded') {
 *   return buildFallback(outcome.error);
 * }
 * return outcome.value;
 * ```
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<RetryOutcome<T>> {
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;
  const isRetryable = hooks.isRetryable ?? defaultIsRetryable;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 1;
  for (;;) {
    hooks.onStateChange?.({ status: 'attempting', attempt });

    try {
      const value = await operation(attempt);
      hooks.onStateChange?.({ status: 'succeeded', attempt });
      return { status: 'succeeded', value, attempts: attempt };
    } catch (thrown) {
      const error = thrown instanceof Error ? thrown : new Error(errorMessage(thrown));

      if (attempt >= maxAttempts || !isRetryable(error)) {
        hooks.onStateChange?.({ status: 'degraded', attempt, error });
        return { status: 'degraded', error, attempts: attempt };
      }

      const delayMs = computeBackoffDelay(attempt, policy, random);
      hooks.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
      attempt++;
    }
  }
}

/**
 * Throwing variant for call sites whose caller already handles failure
 * (the mailbox client: a failed fetch skips one message).
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const outcome = await runWithRetry(operation, policy, hooks);
  if (outcome.status === 'degraded') {
    throw outcome.error;
  }
  return outcome.value;
}
