/**
 * Domain types for the digest pipeline.
 *
 * Data flows one way:
 *
 *   GmailMessage → NormalizedMessage → ExtractionRecord → DigestRecord
 *                                           │
 *                                           └→ LedgerEntry (durable)
 */

import type { ReasoningImage } from '@/lib/ai/openai-client';

export type Priority = 'high' | 'medium' | 'low';

export const PRIORITIES: readonly Priority[] = ['high', 'medium', 'low'];

// ═══════════════════════════════════════════════════════════════════════════════
// NORMALIZED MESSAGE
// ═══════════════════════════════════════════════════════════════════════════════

export type NormalizedImage = ReasoningImage & {
  filename: string;
  width: number;
  height: number;
};

/**
 * Text pulled out of one attachment, or the reason it wasn't.
 */
export type AttachmentText =
  | { filename: string; status: 'extracted'; text: string; truncated: boolean }
  | { filename: string; status: 'skipped'; reason: string };

/**
 * Immutable view of one raw message, built once per run.
 */
export interface NormalizedMessage {
  readonly id: string;
  readonly subject: string;
  readonly sender: string;
  /** ISO 8601 */
  readonly receivedAt: string;
  readonly bodyText: string;
  readonly bodyTruncated: boolean;
  readonly images: readonly NormalizedImage[];
  readonly attachmentText: readonly AttachmentText[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION RECORD
// ═══════════════════════════════════════════════════════════════════════════════

export interface DigestEvent {
  title: string;
  /** A single day, ideally ISO yyyy-mm-dd; never a range */
  date: string;
  time: string;
  location: string;
  description: string;
  priority: Priority;
  /** Who the event concerns (a grade, a committee, "all") */
  scope: string;
}

export interface ActionItem {
  text: string;
  priority: Priority;
  dueDate?: string;
}

/**
 * Why a record degraded.
 * - unparseable: the reply was not a JSON object
 * - invalid_shape: JSON, but not the record schema
 * - date_range: an event's date was a range instead of one day
 * - service_unavailable: the service failed after every retry
 */
export type FallbackReason = 'unparseable' | 'invalid_shape' | 'date_range' | 'service_unavailable';

interface ExtractionBase {
  messageId: string;
  subject: string;
  sender: string;
  receivedAt: string;
  /** Never empty */
  summary: string;
  events: DigestEvent[];
  actionItems: ActionItem[];
  importance: Priority;
  keyDates: string[];
  announcements: string[];
}

export interface FullExtraction extends ExtractionBase {
  kind: 'full';
}

export interface FallbackExtraction extends ExtractionBase {
  kind: 'fallback';
  reason: FallbackReason;
  /** Start of the raw reply (or the error) the record was built from */
  rawExcerpt: string;
  events: [];
  actionItems: [];
}

/**
 * Output of the per-item extractor. Both variants carry every collection,
 * so consumers never branch on a missing field.
 */
export type ExtractionRecord = FullExtraction | FallbackExtraction;

export type ExtractionKind = ExtractionRecord['kind'];

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

export interface LedgerEntry {
  messageId: string;
  processedAt: Date;
  record: ExtractionRecord;
  digestId?: string;
}

export interface LedgerStats {
  totalEntries: number;
  entriesLast7Days: number;
  fullCount: number;
  fallbackCount: number;
  digestCount: number;
  lastDigest?: {
    digestId: string;
    createdAt: string;
    messageCount: number;
    artifactPath?: string;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DIGEST
// ═══════════════════════════════════════════════════════════════════════════════

export interface MergedEvent extends DigestEvent {
  sourceMessageIds: string[];
}

export interface MergedActionItem extends ActionItem {
  sourceMessageIds: string[];
}

export interface DigestSource {
  messageId: string;
  subject: string;
  sender: string;
  receivedAt: string;
  summary: string;
  importance: Priority;
  kind: ExtractionKind;
}

export interface DateRange {
  /** ISO 8601 */
  start: string;
  end: string;
  label: string;
}

export interface DigestRecord {
  digestId: string;
  profile: string;
  /** ISO 8601 */
  createdAt: string;
  dateRangeCovered: DateRange;
  sourceMessageIds: string[];
  executiveSummary: string;
  /** Whether the summary came from the reasoning service or the template */
  summarySource: 'service' | 'template';
  events: MergedEvent[];
  actionItems: MergedActionItem[];
  announcements: string[];
  sources: DigestSource[];
}
