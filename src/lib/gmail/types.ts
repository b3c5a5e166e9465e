/**
 * Types for the mailbox boundary.
 *
 * Raw messages are the Gmail API's own schema types; nothing upstream of the
 * normalizer assumes any field is present.
 *
 * @module lib/gmail/types
 */

import type { gmail_v1 } from 'googleapis';

// ═══════════════════════════════════════════════════════════════════════════════
// GMAIL API TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Full message as returned by messages.get(format: 'full') */
export type GmailMessage = gmail_v1.Schema$Message;

/** One node of the MIME tree */
export type GmailMessagePart = gmail_v1.Schema$MessagePart;

export type GmailHeader = gmail_v1.Schema$MessagePartHeader;

// ═══════════════════════════════════════════════════════════════════════════════
// MAILBOX SOURCE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A candidate message id from a listing. Fetched once per run.
 */
export interface MessageHandle {
  id: string;
  threadId?: string;
}

export interface CandidateQuery {
  /** Label name as shown in the mailbox UI */
  label: string;
  /** Only messages received on or after this day */
  since: Date;
  signal?: AbortSignal;
}

/**
 * Supplies raw messages. Failures are thrown as ServiceError.
 */
export interface MailboxSource {
  /** Candidates in listing order (newest first for Gmail) */
  listCandidates(query: CandidateQuery): Promise<MessageHandle[]>;
  fetchMessage(messageId: string, signal?: AbortSignal): Promise<GmailMessage>;
  /** Decoded bytes of an attachment stored out of line */
  fetchAttachment(messageId: string, attachmentId: string, signal?: AbortSignal): Promise<Buffer>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DELIVERY SINK
// ═══════════════════════════════════════════════════════════════════════════════

export interface DeliveryAttachment {
  filename: string;
  mimeType: string;
  content: Buffer;
}

export interface DeliveryRequest {
  to: string;
  subject: string;
  bodyText: string;
  attachments: DeliveryAttachment[];
}

export interface DeliveryResult {
  messageId: string;
}

/**
 * Sends a rendered digest. The pipeline logs a failure and moves on.
 */
export interface DeliverySink {
  send(request: DeliveryRequest): Promise<DeliveryResult>;
}
