/**
 * Tests for the bounded retry state machine
 *
 * Sleep and randomness are injected; no test waits on a real clock.
 *
 * @module lib/utils/__tests__/retry.test
 */

import { describe, it, expect, vi } from 'vitest';
import { ServiceError } from '@/lib/errors';
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  runWithRetry,
  withRetry,
  type RetryState,
} from '../retry';

const noJitter = () => 0;

describe('computeBackoffDelay', () => {
  it('doubles from the base delay', () => {
    expect(computeBackoffDelay(1, DEFAULT_RETRY_POLICY, noJitter)).toBe(1000);
    expect(computeBackoffDelay(2, DEFAULT_RETRY_POLICY, noJitter)).toBe(2000);
    expect(computeBackoffDelay(3, DEFAULT_RETRY_POLICY, noJitter)).toBe(4000);
  });

  it('adds jitter as a fraction of the delay', () => {
    expect(computeBackoffDelay(2, DEFAULT_RETRY_POLICY, () => 0.5)).toBe(2300);
  });

  it('caps the exponential part at maxDelayMs', () => {
    expect(computeBackoffDelay(10, DEFAULT_RETRY_POLICY, noJitter)).toBe(10000);
  });
});

describe('runWithRetry', () => {
  it('retries transient failures and succeeds', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ServiceError('reset', 'network'))
      .mockRejectedValueOnce(new ServiceError('busy', 'rate_limit', {}, 429))
      .mockResolvedValueOnce('ok');

    const outcome = await runWithRetry(operation, DEFAULT_RETRY_POLICY, { sleep, random: noJitter });

    expect(outcome).toEqual({ status: 'succeeded', value: 'ok', attempts: 3 });
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    expect(operation.mock.calls).toEqual([[1], [2], [3]]);
  });

  it('degrades immediately on a non-retryable error', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const outcome = await runWithRetry(
      () => Promise.reject(new ServiceError('bad key', 'auth', {}, 401)),
      DEFAULT_RETRY_POLICY,
      { sleep }
    );

    expect(outcome.status).toBe('degraded');
    expect(outcome.attempts).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('walks attempting → degraded once attempts run out', async () => {
    const states: RetryState[] = [];
    const error = new ServiceError('timeout', 'timeout');

    const outcome = await runWithRetry(() => Promise.reject(error), DEFAULT_RETRY_POLICY, {
      sleep: async () => {},
      random: noJitter,
      onStateChange: (state) => states.push(state),
    });

    expect(outcome).toEqual({ status: 'degraded', error, attempts: 3 });
    expect(states).toEqual([
      { status: 'attempting', attempt: 1 },
      { status: 'attempting', attempt: 2 },
      { status: 'attempting', attempt: 3 },
      { status: 'degraded', attempt: 3, error },
    ]);
  });

  it('does not retry plain errors by default', async () => {
    const operation = vi.fn(() => Promise.reject(new Error('bug')));
    const outcome = await runWithRetry(operation, DEFAULT_RETRY_POLICY, { sleep: async () => {} });

    expect(outcome.status).toBe('degraded');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('wraps non-Error throws', async () => {
    const outcome = await runWithRetry(() => Promise.reject('boom'), DEFAULT_RETRY_POLICY);

    expect(outcome.status === 'degraded' && outcome.error.message).toBe('boom');
  });
});

describe('withRetry', () => {
  it('throws the final error', async () => {
    await expect(
      withRetry(() => Promise.reject(new ServiceError('down', 'server', {}, 503)), DEFAULT_RETRY_POLICY, {
        sleep: async () => {},
      })
    ).rejects.toThrow('down');
  });
});
