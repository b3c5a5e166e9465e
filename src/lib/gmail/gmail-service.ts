/**
 * Gmail Mailbox Source
 *
 * Lists a label's recent messages and fetches them one by one.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * FEATURES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - Query `label:<name> after:<yyyy/mm/dd>` over the lookback window
 * - Follows nextPageToken until the listing is complete
 * - Every call bounded by a timeout and retried on transient failures
 * - Unknown label → empty listing plus a warning (nothing to digest)
 *
 * @module lib/gmail/gmail-service
 */

import { google, type gmail_v1 } from 'googleapis';
import { format } from 'date-fns';
import { createLogger } from '@/lib/utils/logger';
import {
  withRetry,
  defaultIsRetryable,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
} from '@/lib/utils/retry';
import { toGmailServiceError } from './errors';
import type { GmailAuthClient } from './auth';
import type { CandidateQuery, GmailMessage, MailboxSource, MessageHandle } from './types';

const logger = createLogger('GmailService');

export interface GmailMailboxOptions {
  timeoutMs: number;
  retry?: RetryPolicy;
}

/**
 * Builds the Gmail search query for a label and start day.
 * Spaces in label names are written as dashes, the form Gmail search uses.
 *
 * @example
 * ```typescript
 * buildLabelQuery('School News', new Date(2025, 9, 20)); // 'label:School-News after:2025/10/20'
 * ```
 */
export function buildLabelQuery(label: string, since: Date): string {
  const labelTerm = label.trim().replace(/\s+/g, '-');
  return `label:${labelTerm} after:${format(since, 'yyyy/MM/dd')}`;
}

/**
 * Decodes Gmail's URL-safe base64.
 */
export function decodeBase64Url(data: string): Buffer {
  return Buffer.from(data.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

/**
 * MailboxSource backed by the Gmail API.
 *
 * @example
 * ```typescript
 * const mailbox = new GmailMailboxSource(auth, { timeoutMs: profile.mailbox.timeoutMs });
 * const handles = await mailbox.listCandidates({ label: 'School', since });
 * const message = await mailbox.fetchMessage(handles[0].id);
 * ```
 */
export class GmailMailboxSource implements MailboxSource {
  private readonly gmail: gmail_v1.Gmail;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;

  constructor(auth: GmailAuthClient, options: GmailMailboxOptions) {
    this.gmail = google.gmail({ version: 'v1', auth });
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PUBLIC METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  public async listCandidates(query: CandidateQuery): Promise<MessageHandle[]> {
    const known = await this.labelExists(query.label, query.signal);
    if (!known) {
      logger.warn('Label not found, nothing to list', { label: query.label });
      return [];
    }

    const q = buildLabelQuery(query.label, query.since);
    logger.start('Listing messages', { query: q });

    const handles: MessageHandle[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const response = await this.call('messages.list', query.signal, () =>
        this.gmail.users.messages.list(
          { userId: 'me', q, pageToken },
          { timeout: this.timeoutMs, signal: query.signal }
        )
      );

      for (const message of response.data.messages ?? []) {
        if (message.id) {
          handles.push({ id: message.id, threadId: message.threadId ?? undefined });
        }
      }

      pageToken = response.data.nextPageToken ?? undefined;
      pages++;
    } while (pageToken);

    logger.success('Listing complete', { query: q, count: handles.length, pages });
    return handles;
  }

  public async fetchMessage(messageId: string, signal?: AbortSignal): Promise<GmailMessage> {
    logger.debug('Fetching message', { messageId });

    const response = await this.call('messages.get', signal, () =>
      this.gmail.users.messages.get(
        { userId: 'me', id: messageId, format: 'full' },
        { timeout: this.timeoutMs, signal }
      ),
      { messageId }
    );
    return response.data;
  }

  public async fetchAttachment(
    messageId: string,
    attachmentId: string,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const response = await this.call('attachments.get', signal, () =>
      this.gmail.users.messages.attachments.get(
        { userId: 'me', messageId, id: attachmentId },
        { timeout: this.timeoutMs, signal }
      ),
      { messageId, attachmentId }
    );
    return decodeBase64Url(response.data.data ?? '');
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ═══════════════════════════════════════════════════════════════════════════

  private async labelExists(label: string, signal?: AbortSignal): Promise<boolean> {
    const response = await this.call('labels.list', signal, () =>
      this.gmail.users.labels.list({ userId: 'me' }, { timeout: this.timeoutMs, signal })
    );
    const wanted = label.trim().toLowerCase();
    return (response.data.labels ?? []).some((l) => l.name?.toLowerCase() === wanted);
  }

  /**
   * Runs one API call under the retry policy, mapping failures onto
   * ServiceError. An aborted run stops retrying.
   */
  private call<T>(
    operation: string,
    signal: AbortSignal | undefined,
    request: () => Promise<T>,
    context: Record<string, unknown> = {}
  ): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await request();
        } catch (error) {
          throw toGmailServiceError(error, { operation, ...context });
        }
      },
      this.retry,
      {
        isRetryable: (error) => signal?.aborted !== true && defaultIsRetryable(error),
        onRetry: ({ attempt, delayMs, error }) =>
          logger.warn('Retrying Gmail call', { operation, attempt, delayMs, error: error.message, ...context }),
      }
    );
  }
}
