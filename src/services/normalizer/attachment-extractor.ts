/**
 * Attachment text extraction.
 *
 * PDFs go through pdf-parse; named text attachments are read as UTF-8.
 * Anything else is recorded as skipped. One bad attachment never fails the
 * message.
 *
 * @module services/normalizer/attachment-extractor
 */

import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { errorMessage } from '@/lib/errors';
import { truncateAtBoundary } from '@/lib/utils/text';
import type { AttachmentText } from '@/types/digest';

const TEXT_MIME_TYPES = new Set(['text/plain', 'text/csv', 'text/markdown']);

export type AttachmentKind = 'pdf' | 'text' | 'unsupported';

/**
 * Decides how an attachment can be read, from its MIME type and filename.
 */
export function classifyAttachment(filename: string, mimeType: string): AttachmentKind {
  const lowerName = filename.toLowerCase();
  const lowerType = mimeType.toLowerCase();

  if (lowerType === 'application/pdf' || lowerName.endsWith('.pdf')) {
    return 'pdf';
  }
  if (TEXT_MIME_TYPES.has(lowerType) || lowerName.endsWith('.txt')) {
    return 'text';
  }
  return 'unsupported';
}

/**
 * Turns PDF bytes into text. Swappable for tests.
 */
export type PdfTextReader = (content: Buffer) => Promise<string>;

export const readPdfText: PdfTextReader = async (content) => {
  const data = await pdfParse(content);
  return data.text;
};

/**
 * Extracts and caps the text of one attachment.
 *
 * @example
 * ```typescript
 * await extractAttachmentText('menu.pdf', 'application/pdf', bytes, 4000);
 * // { filename: 'menu.pdf', status: 'extracted', text: 'Lunch menu ...', truncated: false }
 * ```
 */
export async function extractAttachmentText(
  filename: string,
  mimeType: string,
  content: Buffer,
  charLimit: number,
  readPdf: PdfTextReader = readPdfText
): Promise<AttachmentText> {
  const kind = classifyAttachment(filename, mimeType);
  if (kind === 'unsupported') {
    return { filename, status: 'skipped', reason: `unsupported type ${mimeType}` };
  }

  let raw: string;
  try {
    raw = kind === 'pdf' ? await readPdf(content) : content.toString('utf-8');
  } catch (error) {
    return { filename, status: 'skipped', reason: `extraction failed: ${errorMessage(error)}` };
  }

  const cleaned = raw.replace(/\r\n?/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
  if (cleaned === '') {
    return { filename, status: 'skipped', reason: 'no text content' };
  }

  const { text, truncated } = truncateAtBoundary(cleaned, charLimit);
  return { filename, status: 'extracted', text, truncated };
}
