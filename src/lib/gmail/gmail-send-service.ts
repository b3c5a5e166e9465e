/**
 * Gmail Send Service
 *
 * Delivers a rendered digest: a plain-text body with the document attached,
 * sent through the Gmail API as a multipart/mixed RFC 2822 message.
 *
 * Delivery is fire-and-forget from the pipeline's point of view. A failure
 * comes back as ServiceError; the pipeline logs it and the run still
 * completes.
 *
 * @module lib/gmail/gmail-send-service
 */

import { randomUUID } from 'node:crypto';
import { google, type gmail_v1 } from 'googleapis';
import { createLogger } from '@/lib/utils/logger';
import { toGmailServiceError } from './errors';
import type { GmailAuthClient } from './auth';
import type { DeliveryAttachment, DeliveryRequest, DeliveryResult, DeliverySink } from './types';

const logger = createLogger('GmailSendService');

// ═══════════════════════════════════════════════════════════════════════════════
// MIME BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Encodes a header value for RFC 2047 (MIME encoded-word) when it has
 * non-ASCII characters.
 *
 * @example
 * ```typescript
 * encodeHeaderValue('Weekly digest');   // 'Weekly digest'
 * encodeHeaderValue('Café digest');     // '=?UTF-8?B?Q2Fmw6kgZGlnZXN0?='
 * ```
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x00-\x7F]*$/.test(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value).toString('base64')}?=`;
}

/**
 * Base64 wrapped at 76 characters per line.
 */
function toBase64Lines(content: Buffer): string {
  return (content.toString('base64').match(/.{1,76}/g) ?? []).join('\r\n');
}

function attachmentPart(boundary: string, attachment: DeliveryAttachment): string[] {
  const filename = encodeHeaderValue(attachment.filename).replace(/"/g, '');
  return [
    `--${boundary}`,
    `Content-Type: ${attachment.mimeType}; name="${filename}"`,
    `Content-Disposition: attachment; filename="${filename}"`,
    'Content-Transfer-Encoding: base64',
    '',
    toBase64Lines(attachment.content),
  ];
}

/**
 * Builds a multipart/mixed MIME message: one text/plain part, then one part
 * per attachment.
 *
 * @param boundary - Part boundary; generated when omitted
 */
export function buildMimeMessage(
  request: DeliveryRequest & { from?: string; date?: Date },
  boundary = `----=_Digest_${randomUUID()}`
): string {
  const headers: string[] = [];
  if (request.from) {
    headers.push(`From: ${request.from}`);
  }
  headers.push(`To: ${request.to}`);
  headers.push(`Subject: ${encodeHeaderValue(request.subject)}`);
  headers.push(`Date: ${(request.date ?? new Date()).toUTCString()}`);
  headers.push('MIME-Version: 1.0');
  headers.push(`Content-Type: multipart/mixed; boundary="${boundary}"`);

  const parts: string[] = [
    `--${boundary}`,
    'Content-Type: text/plain; charset="UTF-8"',
    'Content-Transfer-Encoding: base64',
    '',
    toBase64Lines(Buffer.from(request.bodyText, 'utf-8')),
  ];

  for (const attachment of request.attachments) {
    parts.push(...attachmentPart(boundary, attachment));
  }

  parts.push(`--${boundary}--`);

  return headers.join('\r\n') + '\r\n\r\n' + parts.join('\r\n');
}

/**
 * Encodes a MIME message for the Gmail API (URL-safe base64, no padding).
 */
export function encodeMessage(message: string): string {
  return Buffer.from(message)
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}

// ═══════════════════════════════════════════════════════════════════════════════
// SEND SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * DeliverySink backed by users.messages.send.
 *
 * @example
 * ```typescript
 * const sink = new GmailSendService(auth, { timeoutMs: 30000 });
 * await sink.send({ to: 'family@example.com', subject, bodyText, attachments });
 * ```
 */
export class GmailSendService implements DeliverySink {
  private readonly gmail: gmail_v1.Gmail;
  private readonly timeoutMs: number;

  constructor(auth: GmailAuthClient, options: { timeoutMs: number }) {
    this.gmail = google.gmail({ version: 'v1', auth });
    this.timeoutMs = options.timeoutMs;
  }

  public async send(request: DeliveryRequest): Promise<DeliveryResult> {
    logger.start('Sending digest', {
      to: request.to,
      attachments: request.attachments.map((a) => a.filename),
    });

    try {
      const raw = encodeMessage(buildMimeMessage(request));
      const response = await this.gmail.users.messages.send(
        { userId: 'me', requestBody: { raw } },
        { timeout: this.timeoutMs }
      );

      const messageId = response.data.id ?? '';
      logger.success('Digest sent', { to: request.to, messageId });
      return { messageId };
    } catch (error) {
      throw toGmailServiceError(error, { operation: 'messages.send', to: request.to });
    }
  }
}
