/**
 * PDF Digest Renderer
 *
 * Lays a DigestRecord out as a PDF document with pdfkit and writes it to the
 * profile's output directory.
 *
 * @module services/render/pdf-renderer
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import PDFDocument from 'pdfkit';
import { format, parseISO } from 'date-fns';
import { createLogger, type EnhancedLogger } from '@/lib/utils/logger';
import { fillTemplate, stripMarkdown } from '@/lib/utils/text';
import type { DigestRecord } from '@/types/digest';
import { digestTitle, formatActionItemLine, formatEventLine } from './text-digest';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RenderedDigest {
  /** Absolute path of the written file */
  path: string;
  filename: string;
  mimeType: string;
  content: Buffer;
}

export interface DocumentRenderer {
  render(record: DigestRecord): Promise<RenderedDigest>;
}

export interface PdfRendererOptions {
  directory: string;
  /** `{profile}` and `{date}` (yyyy-MM-dd of the digest) are filled in */
  filenamePattern: string;
  logger?: EnhancedLogger;
}

const PRIORITY_COLORS = { high: '#b42318', medium: '#1d2939', low: '#667085' } as const;

// ═══════════════════════════════════════════════════════════════════════════════
// LAYOUT
// ═══════════════════════════════════════════════════════════════════════════════

function sectionHeading(doc: PDFKit.PDFDocument, title: string): void {
  doc.moveDown();
  doc.font('Helvetica-Bold').fontSize(14).fillColor('#101828').text(title, { underline: true });
  doc.moveDown(0.5);
  doc.font('Helvetica').fontSize(11);
}

function layoutDigest(doc: PDFKit.PDFDocument, record: DigestRecord): void {
  doc.font('Helvetica-Bold').fontSize(20).text(digestTitle(record), { align: 'center' });
  doc.moveDown(0.5);
  doc
    .font('Helvetica')
    .fontSize(10)
    .fillColor('#667085')
    .text(`${record.sourceMessageIds.length} messages · generated ${format(parseISO(record.createdAt), 'PPpp')}`, {
      align: 'center',
    });

  sectionHeading(doc, 'Summary');
  doc.fillColor('#101828').text(stripMarkdown(record.executiveSummary));

  if (record.events.length > 0) {
    sectionHeading(doc, 'Events');
    for (const event of record.events) {
      doc.font('Helvetica-Bold').fillColor(PRIORITY_COLORS[event.priority]).text(formatEventLine(event));
      doc.font('Helvetica').fillColor('#101828');
      if (event.description) {
        doc.fontSize(10).text(event.description, { indent: 15 });
        doc.fontSize(11);
      }
      doc.moveDown(0.3);
    }
  }

  if (record.actionItems.length > 0) {
    sectionHeading(doc, 'Action Items');
    for (const item of record.actionItems) {
      doc.fillColor(PRIORITY_COLORS[item.priority]).text(formatActionItemLine(item));
    }
    doc.fillColor('#101828');
  }

  if (record.announcements.length > 0) {
    sectionHeading(doc, 'Announcements');
    for (const announcement of record.announcements) {
      doc.text(`• ${announcement}`);
    }
  }

  doc.addPage();
  sectionHeading(doc, 'Messages Included');
  for (const source of record.sources) {
    doc.font('Helvetica-Bold').fillColor('#101828').text(`[${source.kind}] ${source.subject}`);
    doc.font('Helvetica').fontSize(9).fillColor('#667085').text(`${source.sender} · ${source.receivedAt}`);
    doc.fontSize(10).fillColor('#101828').text(stripMarkdown(source.summary), { indent: 15 });
    doc.fontSize(11);
    doc.moveDown(0.5);
  }
}

/**
 * Renders the document in memory.
 */
export function renderDigestPdf(record: DigestRecord): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    try {
      const doc = new PDFDocument({
        margin: 50,
        info: { Title: digestTitle(record), CreationDate: parseISO(record.createdAt) },
      });
      const chunks: Buffer[] = [];

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      layoutDigest(doc, record);
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

export function digestFilename(pattern: string, record: DigestRecord): string {
  const profile = record.profile.replace(/[^\w-]+/g, '-');
  const date = format(parseISO(record.createdAt), 'yyyy-MM-dd');
  return fillTemplate(pattern, { profile, date });
}

// ═══════════════════════════════════════════════════════════════════════════════
// RENDERER
// ═══════════════════════════════════════════════════════════════════════════════

export class PdfDigestRenderer implements DocumentRenderer {
  private readonly directory: string;
  private readonly filenamePattern: string;
  private readonly logger: EnhancedLogger;

  constructor(options: PdfRendererOptions) {
    this.directory = options.directory;
    this.filenamePattern = options.filenamePattern;
    this.logger = options.logger ?? createLogger('PdfDigestRenderer');
  }

  public async render(record: DigestRecord): Promise<RenderedDigest> {
    const content = await renderDigestPdf(record);
    const filename = digestFilename(this.filenamePattern, record);
    const filePath = path.resolve(this.directory, filename);

    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content);

    this.logger.info('Digest document written', {
      digestId: record.digestId,
      path: filePath,
      bytes: content.length,
    });

    return { path: filePath, filename, mimeType: 'application/pdf', content };
  }
}
