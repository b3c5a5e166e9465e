/**
 * Reasoning-service reply → ExtractionRecord.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PARSING LADDER
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. Strict JSON.parse of the whole reply
 * 2. JSON.parse of the substring from the first `{` to the last `}`
 * 3. Fallback record built from the start of the raw reply
 *
 * A decoded object is then validated leniently: unknown fields are ignored,
 * bad enum values fall back to "medium", entries without a title are
 * dropped. An event whose date is a range fails the whole record.
 *
 * @module services/extractor/response-parser
 */

import { z } from 'zod';
import { excerpt } from '@/lib/utils/text';
import type {
  ActionItem,
  DigestEvent,
  ExtractionRecord,
  FallbackExtraction,
  FallbackReason,
  NormalizedMessage,
  Priority,
} from '@/types/digest';

/** Used when a parsed reply carries no summary */
export const DEFAULT_SUMMARY = 'Email processed - see events and action items below.';

// ═══════════════════════════════════════════════════════════════════════════════
// JSON DECODING
// ═══════════════════════════════════════════════════════════════════════════════

export type DecodeResult = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Strict decode first, then the outermost `{...}` span.
 *
 * @example
 * ```typescript
 * decodeJsonReply('Here you go: {"summary":"Hi"} Thanks!');
 * // { ok: true, value: { summary: 'Hi' } }
 * ```
 */
export function decodeJsonReply(text: string): DecodeResult {
  const strict = tryParse(text.trim());
  if (strict.ok) {
    return strict;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { ok: false };
  }
  return tryParse(text.slice(start, end + 1));
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATE RANGE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

const PLACEHOLDER_PHRASES = /\bto be (?:announced|determined|confirmed)\b/gi;

/** Whole single-day dates: ISO with or without padding or time, M-D-Y, D-M-Y, M/D */
const SINGLE_DAY =
  /\b\d{4}-\d{1,2}-\d{1,2}(?:T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?|\b\d{1,2}[-/.]\d{1,2}[-/.]\d{2,4}\b|\b\d{1,2}\/\d{1,2}\b/g;

const MONTH = String.raw`(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.?\s+`;
const WEEKDAY = String.raw`\b(?:mon|tues?|wed(?:nes)?|thu(?:rs?)?|fri|sat(?:ur)?|sun)(?:day)?\b`;
const DAY = String.raw`(?:#|(?:\b${MONTH})?\b\d{1,2}(?:st|nd|rd|th)?\b|${WEEKDAY})`;
const CONNECTOR = String.raw`(?:\s*[-–—&]\s*|\s+(?:to|through|thru|until|till|and)\s+)`;

/** Two day tokens joined by a range connector */
const RANGE = new RegExp(`${DAY}${CONNECTOR}${DAY}`, 'i');

/**
 * True when a date field describes more than one day: two dates, day
 * numbers or weekdays joined by a dash, "to", "through", "until" or "and".
 *
 * @example
 * ```typescript
 * isDateRange('2025-10-27');                     // false
 * isDateRange('10-27-2025');                     // false
 * isDateRange('Oct 28 (to be moved if it rains)'); // false
 * isDateRange('Oct 27-30');                      // true
 * isDateRange('2025-10-27 to 2025-10-30');       // true
 * isDateRange('Monday through Thursday');        // true
 * ```
 */
export function isDateRange(value: string): boolean {
  const text = value.trim().replace(PLACEHOLDER_PHRASES, '').replace(SINGLE_DAY, '#');
  return text !== '' && RANGE.test(text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// LENIENT SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

function toPriority(value: unknown): Priority {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return normalized === 'high' || normalized === 'low' ? normalized : 'medium';
}

const looseString = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string().trim().catch('')
);

const priorityField = z.unknown().transform(toPriority);

const eventSchema = z.object({
  title: z.string().trim().min(1),
  date: looseString,
  time: looseString,
  location: looseString,
  description: looseString,
  priority: priorityField,
  scope: looseString,
});

const actionItemSchema = z
  .object({
    text: z.string().trim().min(1),
    priority: priorityField,
    due_date: looseString.optional(),
    dueDate: looseString.optional(),
  })
  .transform(
    (item): ActionItem => {
      const due = item.dueDate || item.due_date;
      return due ? { text: item.text, priority: item.priority, dueDate: due } : { text: item.text, priority: item.priority };
    }
  );

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .map((item) => (typeof item === 'string' ? item.trim() : ''))
      .filter((item) => item !== '')
  );

/** Keeps the entries that validate, drops the rest */
function validEntries<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((item) => {
        const parsed = schema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      })
    );
}

const replySchema = z.object({
  summary: looseString.optional(),
  events: validEntries(eventSchema),
  action_items: validEntries(actionItemSchema).optional(),
  actionItems: validEntries(actionItemSchema).optional(),
  importance: priorityField,
  key_dates: stringList.optional(),
  keyDates: stringList.optional(),
  announcements: stringList.optional(),
  important_announcements: stringList.optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECORD CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

export interface FallbackDetails {
  reason: FallbackReason;
  /** Raw reply, or the error message when the service never answered */
  raw: string;
  excerptChars: number;
  /** Summary to keep instead of the raw excerpt */
  summary?: string;
}

/**
 * Degraded record: empty events and action items, medium importance, a
 * non-empty summary.
 */
export function buildFallbackRecord(message: NormalizedMessage, details: FallbackDetails): FallbackExtraction {
  const rawExcerpt = excerpt(details.raw, details.excerptChars);
  const summary = details.summary?.trim() || rawExcerpt || DEFAULT_SUMMARY;

  return {
    kind: 'fallback',
    reason: details.reason,
    rawExcerpt,
    messageId: message.id,
    subject: message.subject,
    sender: message.sender,
    receivedAt: message.receivedAt,
    summary,
    events: [],
    actionItems: [],
    importance: 'medium',
    keyDates: [],
    announcements: [],
  };
}

/**
 * Parses a reply into a full record, or the fallback record when the reply
 * is not a usable object or names a range as an event date.
 */
export function parseExtractionReply(
  message: NormalizedMessage,
  reply: string,
  excerptChars: number
): ExtractionRecord {
  const decoded = decodeJsonReply(reply);
  if (!decoded.ok) {
    return buildFallbackRecord(message, { reason: 'unparseable', raw: reply, excerptChars });
  }

  const parsed = replySchema.safeParse(decoded.value);
  if (!parsed.success) {
    return buildFallbackRecord(message, { reason: 'invalid_shape', raw: reply, excerptChars });
  }

  const data = parsed.data;
  const summary = data.summary || DEFAULT_SUMMARY;
  const events: DigestEvent[] = data.events;

  if (events.some((event) => isDateRange(event.date))) {
    return buildFallbackRecord(message, { reason: 'date_range', raw: reply, excerptChars, summary });
  }

  return {
    kind: 'full',
    messageId: message.id,
    subject: message.subject,
    sender: message.sender,
    receivedAt: message.receivedAt,
    summary,
    events,
    actionItems: data.actionItems ?? data.action_items ?? [],
    importance: data.importance,
    keyDates: data.keyDates ?? data.key_dates ?? [],
    announcements: data.announcements ?? data.important_announcements ?? [],
  };
}
