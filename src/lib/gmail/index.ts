/**
 * Gmail Integration Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * MODULE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * - **GmailMailboxSource**: lists labeled messages and fetches bodies/attachments
 * - **GmailSendService**: delivers the rendered digest as a MIME message
 * - **createGmailAuth**: OAuth2 client from a refresh token
 * - **toGmailServiceError**: googleapis failures → ServiceError
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * USAGE EXAMPLE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { createGmailAuth, GmailMailboxSource } from '@/lib/gmail';
 *
 * const auth = createGmailAuth(credentials.gmail);
 * const mailbox = new GmailMailboxSource(auth, { timeoutMs: 30000 });
 * const handles = await mailbox.listCandidates({ label: 'School', since });
 * ```
 *
 * @module lib/gmail
 */

export { createGmailAuth, type GmailAuthClient } from './auth';
export { extractStatusCode, toGmailServiceError } from './errors';
export {
  GmailMailboxSource,
  buildLabelQuery,
  decodeBase64Url,
  type GmailMailboxOptions,
} from './gmail-service';
export { GmailSendService, buildMimeMessage, encodeHeaderValue, encodeMessage } from './gmail-send-service';
export type {
  CandidateQuery,
  DeliveryAttachment,
  DeliveryRequest,
  DeliveryResult,
  DeliverySink,
  GmailHeader,
  GmailMessage,
  GmailMessagePart,
  MailboxSource,
  MessageHandle,
} from './types';
