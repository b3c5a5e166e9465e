import { describe, it, expect } from 'vitest';
import OpenAI from 'openai';
import { ServiceError } from '@/lib/errors';
import { toServiceError } from '../openai-client';

describe('toServiceError', () => {
  it('maps SDK status errors by HTTP status', () => {
    const rateLimited = toServiceError(new OpenAI.RateLimitError(429, undefined, 'Too many requests', undefined));
    const unauthorized = toServiceError(new OpenAI.AuthenticationError(401, undefined, 'Bad key', undefined));
    const unavailable = toServiceError(new OpenAI.InternalServerError(503, undefined, 'Overloaded', undefined));

    expect([rateLimited.kind, rateLimited.statusCode, rateLimited.retryable]).toEqual(['rate_limit', 429, true]);
    expect([unauthorized.kind, unauthorized.retryable]).toEqual(['auth', false]);
    expect(unavailable.kind).toBe('server');
  });

  it('maps connection failures, checking timeouts first', () => {
    expect(toServiceError(new OpenAI.APIConnectionTimeoutError()).kind).toBe('timeout');
    expect(toServiceError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))).toMatchObject({
      kind: 'network',
      message: 'Reasoning service unreachable: socket hang up',
    });
  });

  it('does not retry a caller abort', () => {
    const aborted = toServiceError(new OpenAI.APIUserAbortError());

    expect(aborted.kind).toBe('request');
    expect(aborted.retryable).toBe(false);
  });

  it('passes ServiceErrors through and wraps anything else as network', () => {
    const original = new ServiceError('empty', 'invalid_response');

    expect(toServiceError(original)).toBe(original);
    expect(toServiceError('weird')).toMatchObject({ kind: 'network', message: 'weird' });
  });
});
