/**
 * Gmail error mapping.
 *
 * googleapis throws GaxiosError with the HTTP status in `code`, `status` or
 * `response.status` depending on where the failure happened, and socket
 * failures with string codes. Everything becomes a ServiceError here so the
 * retry policy has one thing to look at.
 *
 * - 401/403 → auth (not retried)
 * - 429 → rate_limit
 * - 5xx → server
 * - other 4xx → request (not retried)
 * - socket timeouts → timeout; other socket errors → network
 *
 * @module lib/gmail/errors
 */

import { ServiceError, errorMessage, kindFromStatus } from '@/lib/errors';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ECONNABORTED']);

/**
 * Extracts HTTP status code from a Google API error.
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  // Direct numeric code property
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }

  // Numeric string code ("404")
  if ('code' in error && typeof error.code === 'string' && /^\d{3}$/.test(error.code)) {
    return Number(error.code);
  }

  // Nested in response
  if (
    'response' in error &&
    error.response !== null &&
    typeof error.response === 'object' &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }

  // GaxiosError format
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
}

function extractErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Converts anything thrown by the Gmail client into a ServiceError.
 */
export function toGmailServiceError(
  error: unknown,
  context: Record<string, unknown> = {}
): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  const message = errorMessage(error);
  const fullContext = { service: 'gmail', ...context };
  const statusCode = extractStatusCode(error);

  if (statusCode !== undefined) {
    return new ServiceError(`Gmail API error: ${message}`, kindFromStatus(statusCode), fullContext, statusCode);
  }

  const code = extractErrorCode(error);
  if ((code && TIMEOUT_CODES.has(code)) || /timed? ?out/i.test(message)) {
    return new ServiceError(`Gmail request timed out: ${message}`, 'timeout', fullContext);
  }

  return new ServiceError(`Gmail request failed: ${message}`, 'network', { ...fullContext, code });
}
