/**
 * Content Normalizer
 *
 * Turns one raw mailbox message into a NormalizedMessage, or throws
 * ContentError when the message has no usable structure.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * WHAT HAPPENS TO A MESSAGE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Headers: id, From (placeholder when missing), Subject, Date (falls back
 *    to internalDate)
 * 2. Body: HTML preferred over plain text, converted to text, then cut at the
 *    last paragraph break before `bodyCharLimit`
 * 3. Images: kept only if readable, at most `maxImageBytes`, and at least
 *    `minImageWidth × minImageHeight`. Smaller images are treated as logos
 *    and signatures and dropped; the drop is lossy and not recorded. Images
 *    the HTML body references by `cid:` come first, in body order.
 * 4. Attachments (when enabled): text extracted per attachment, each capped at
 *    `attachmentCharLimit`; failures are recorded as skipped
 *
 * @module services/normalizer/content-normalizer
 */

import { imageSize } from 'image-size';
import { createLogger, type EnhancedLogger } from '@/lib/utils/logger';
import { ContentError, errorMessage } from '@/lib/errors';
import { findInlineImageIds, htmlToPlainText } from '@/lib/utils/html';
import { truncateAtBoundary } from '@/lib/utils/text';
import { decodeBase64Url } from '@/lib/gmail/gmail-service';
import type { ProcessingConfig } from '@/config/profiles';
import type { GmailHeader, GmailMessage, GmailMessagePart } from '@/lib/gmail/types';
import type { AttachmentText, NormalizedImage, NormalizedMessage } from '@/types/digest';
import { extractAttachmentText, readPdfText, type PdfTextReader } from './attachment-extractor';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetches attachment bytes stored out of line (`body.attachmentId`).
 */
export type AttachmentFetcher = (messageId: string, attachmentId: string) => Promise<Buffer>;

export interface NormalizerDependencies {
  fetchAttachment: AttachmentFetcher;
  readPdf?: PdfTextReader;
  logger?: EnhancedLogger;
}

/**
 * Flattened view of the MIME tree.
 */
interface MessageParts {
  plain?: GmailMessagePart;
  html?: GmailMessagePart;
  images: GmailMessagePart[];
  attachments: GmailMessagePart[];
}

interface MessageBody {
  text: string;
  /** `cid:` references in the HTML body, in document order */
  inlineImageIds: string[];
}

/** Shown when a message carries no From header */
export const UNKNOWN_SENDER = 'Unknown';

// ═══════════════════════════════════════════════════════════════════════════════
// HEADER HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Gets a header value by name (case-insensitive).
 */
export function getHeader(headers: GmailHeader[] | null | undefined, name: string): string | undefined {
  const wanted = name.toLowerCase();
  const value = headers?.find((h) => h.name?.toLowerCase() === wanted)?.value?.trim();
  return value ? value : undefined;
}

/**
 * ISO timestamp from the Date header, else from internalDate (ms since
 * epoch). Undefined when neither parses.
 */
export function parseReceivedAt(dateHeader: string | undefined, internalDate: string | null | undefined): string | undefined {
  if (dateHeader) {
    const parsed = new Date(dateHeader);
    if (!isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }
  if (internalDate && /^\d+$/.test(internalDate)) {
    return new Date(Number(internalDate)).toISOString();
  }
  return undefined;
}

function collectParts(part: GmailMessagePart, into: MessageParts): MessageParts {
  const mimeType = (part.mimeType ?? '').toLowerCase();
  const filename = part.filename ?? '';

  if (mimeType.startsWith('multipart/')) {
    for (const child of part.parts ?? []) {
      collectParts(child, into);
    }
    return into;
  }

  if (mimeType.startsWith('image/')) {
    into.images.push(part);
  } else if (filename !== '') {
    into.attachments.push(part);
  } else if (mimeType === 'text/html' && !into.html) {
    into.html = part;
  } else if (mimeType === 'text/plain' && !into.plain) {
    into.plain = part;
  }

  for (const child of part.parts ?? []) {
    collectParts(child, into);
  }
  return into;
}

/**
 * Images referenced from the body first, in reference order; the rest keep
 * their MIME order.
 */
export function orderByBodyPosition(images: NormalizedImage[], inlineImageIds: string[]): NormalizedImage[] {
  const position = (image: NormalizedImage): number => {
    const index = inlineImageIds.indexOf(image.contentId);
    return index === -1 ? inlineImageIds.length : index;
  };
  return [...images].sort((a, b) => position(a) - position(b));
}

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Builds NormalizedMessages for one profile.
 *
 * @example
 * ```typescript
 * const normalizer = new ContentNormalizer(profile.processing, {
 *   fetchAttachment: (id, attachmentId) => mailbox.fetchAttachment(id, attachmentId),
 * });
 * const message = await normalizer.normalize(raw);
 * ```
 */
export class ContentNormalizer {
  private readonly config: ProcessingConfig;
  private readonly fetchAttachment: AttachmentFetcher;
  private readonly readPdf: PdfTextReader;
  private readonly logger: EnhancedLogger;

  constructor(config: ProcessingConfig, deps: NormalizerDependencies) {
    this.config = config;
    this.fetchAttachment = deps.fetchAttachment;
    this.readPdf = deps.readPdf ?? readPdfText;
    this.logger = deps.logger ?? createLogger('ContentNormalizer');
  }

  /**
   * @throws ContentError when the message lacks an id or a payload
   */
  public async normalize(raw: GmailMessage): Promise<NormalizedMessage> {
    const id = raw.id;
    if (!id) {
      throw new ContentError('Message has no id');
    }
    const payload = raw.payload;
    if (!payload) {
      throw new ContentError('Message has no payload', { messageId: id });
    }

    let sender = getHeader(payload.headers, 'From');
    if (!sender) {
      this.logger.warn('No sender on message, using placeholder', { messageId: id });
      sender = UNKNOWN_SENDER;
    }

    const subject = getHeader(payload.headers, 'Subject') ?? '(no subject)';
    let receivedAt = parseReceivedAt(getHeader(payload.headers, 'Date'), raw.internalDate);
    if (!receivedAt) {
      this.logger.warn('No usable date on message, using current time', { messageId: id });
      receivedAt = new Date().toISOString();
    }

    const parts = collectParts(payload, { images: [], attachments: [] });

    const { text: fullBody, inlineImageIds } = await this.extractBody(id, parts, raw.snippet ?? '');
    const { text: bodyText, truncated: bodyTruncated } = truncateAtBoundary(
      fullBody,
      this.config.bodyCharLimit
    );
    if (bodyTruncated) {
      this.logger.debug('Truncated body', {
        messageId: id,
        originalLength: fullBody.length,
        truncatedLength: bodyText.length,
      });
    }

    const images = orderByBodyPosition(await this.extractImages(id, parts.images), inlineImageIds);
    const attachmentText = this.config.processAttachments
      ? await this.extractAttachments(id, parts.attachments)
      : [];

    this.logger.debug('Message normalized', {
      messageId: id,
      bodyLength: bodyText.length,
      images: images.length,
      attachments: attachmentText.length,
    });

    return Object.freeze({
      id,
      subject,
      sender,
      receivedAt,
      bodyText,
      bodyTruncated,
      images: Object.freeze(images),
      attachmentText: Object.freeze(attachmentText),
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private async partBytes(messageId: string, part: GmailMessagePart): Promise<Buffer | undefined> {
    if (part.body?.data) {
      return decodeBase64Url(part.body.data);
    }
    if (part.body?.attachmentId) {
      return this.fetchAttachment(messageId, part.body.attachmentId);
    }
    return undefined;
  }

  private async extractBody(messageId: string, parts: MessageParts, snippet: string): Promise<MessageBody> {
    const preferred = parts.html ?? parts.plain;
    if (!preferred) {
      return { text: snippet.trim(), inlineImageIds: [] };
    }

    let bytes: Buffer | undefined;
    try {
      bytes = await this.partBytes(messageId, preferred);
    } catch (error) {
      throw new ContentError(`Message body could not be read: ${errorMessage(error)}`, { messageId });
    }

    const raw = (bytes?.toString('utf-8') ?? '').replace(/\r\n?/g, '\n');
    if (preferred === parts.html) {
      return { text: htmlToPlainText(raw), inlineImageIds: findInlineImageIds(raw) };
    }
    return { text: raw.trim(), inlineImageIds: [] };
  }

  private async extractImages(messageId: string, imageParts: GmailMessagePart[]): Promise<NormalizedImage[]> {
    const kept: NormalizedImage[] = [];

    for (const part of imageParts) {
      const filename = part.filename || 'inline image';
      const contentId =
        getHeader(part.headers, 'Content-ID')?.replace(/^<|>$/g, '') ||
        part.filename ||
        `part-${part.partId ?? kept.length}`;

      const declaredSize = part.body?.size ?? 0;
      if (declaredSize > this.config.maxImageBytes) {
        this.logger.debug('Dropping oversized image', { messageId, filename, bytes: declaredSize });
        continue;
      }

      let data: Buffer | undefined;
      try {
        data = await this.partBytes(messageId, part);
      } catch (error) {
        this.logger.warn('Could not fetch image', { messageId, filename, error: errorMessage(error) });
        continue;
      }
      if (!data || data.length === 0 || data.length > this.config.maxImageBytes) {
        continue;
      }

      let width: number;
      let height: number;
      try {
        const dimensions = imageSize(data);
        width = dimensions.width ?? 0;
        height = dimensions.height ?? 0;
      } catch {
        this.logger.debug('Dropping unreadable image', { messageId, filename });
        continue;
      }

      if (width < this.config.minImageWidth || height < this.config.minImageHeight) {
        this.logger.debug('Dropping small image', { messageId, filename, width, height });
        continue;
      }

      kept.push({
        contentId,
        filename,
        mimeType: part.mimeType ?? 'application/octet-stream',
        data,
        width,
        height,
      });
    }

    return kept;
  }

  private async extractAttachments(
    messageId: string,
    attachmentParts: GmailMessagePart[]
  ): Promise<AttachmentText[]> {
    const results: AttachmentText[] = [];

    for (const part of attachmentParts) {
      const filename = part.filename ?? 'attachment';
      const mimeType = part.mimeType ?? 'application/octet-stream';

      let content: Buffer | undefined;
      try {
        content = await this.partBytes(messageId, part);
      } catch (error) {
        results.push({ filename, status: 'skipped', reason: `fetch failed: ${errorMessage(error)}` });
        continue;
      }
      if (!content) {
        results.push({ filename, status: 'skipped', reason: 'empty attachment' });
        continue;
      }

      const extracted = await extractAttachmentText(
        filename,
        mimeType,
        content,
        this.config.attachmentCharLimit,
        this.readPdf
      );
      if (extracted.status === 'skipped') {
        this.logger.info('Attachment extraction skipped', { messageId, filename, reason: extracted.reason });
      }
      results.push(extracted);
    }

    return results;
  }
}
