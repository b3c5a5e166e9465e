/**
 * Deterministic merge of per-message extraction results.
 *
 * Everything here is pure: the same records in the same order always give the
 * same digest content.
 *
 * @module services/consolidator/merge
 */

import { format, isValid, max, min, parseISO } from 'date-fns';
import { normalizeKey } from '@/lib/utils/text';
import type {
  DateRange,
  ExtractionRecord,
  MergedActionItem,
  MergedEvent,
  Priority,
} from '@/types/digest';

const DESCRIPTION_SEPARATOR = '; ';

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };

// ═══════════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Case-insensitive `(title, date)` key.
 */
export function eventKey(title: string, date: string): string {
  return `${normalizeKey(title)}|${date.trim().toLowerCase()}`;
}

function dateSortValue(date: string): number {
  const parsed = parseISO(date.trim());
  return isValid(parsed) ? parsed.getTime() : Number.POSITIVE_INFINITY;
}

/**
 * Merges events across records.
 *
 * On a key collision the first-seen entry keeps its non-empty fields, empty
 * ones are filled from later duplicates, and distinct descriptions are joined
 * in processing order. Output is sorted by date (stable; unparseable dates
 * last).
 */
export function mergeEvents(records: readonly ExtractionRecord[]): MergedEvent[] {
  const merged = new Map<string, MergedEvent>();
  const descriptions = new Map<string, string[]>();

  for (const record of records) {
    for (const event of record.events) {
      const key = eventKey(event.title, event.date);
      const description = event.description.trim();
      const existing = merged.get(key);

      if (!existing) {
        merged.set(key, { ...event, description, sourceMessageIds: [record.messageId] });
        descriptions.set(key, description ? [description] : []);
        continue;
      }

      existing.time = existing.time || event.time;
      existing.location = existing.location || event.location;
      existing.scope = existing.scope || event.scope;

      const parts = descriptions.get(key) ?? [];
      if (description && !parts.some((part) => normalizeKey(part) === normalizeKey(description))) {
        parts.push(description);
        existing.description = parts.join(DESCRIPTION_SEPARATOR);
      }
      descriptions.set(key, parts);

      if (!existing.sourceMessageIds.includes(record.messageId)) {
        existing.sourceMessageIds.push(record.messageId);
      }
    }
  }

  return [...merged.values()].sort((a, b) => {
    const aValue = dateSortValue(a.date);
    const bValue = dateSortValue(b.date);
    if (aValue === bValue) return 0;
    return aValue < bValue ? -1 : 1;
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ACTION ITEMS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Concatenates action items, collapses identical normalized text to one
 * entry at the highest priority seen, and sorts high → medium → low
 * (stable within a priority).
 */
export function mergeActionItems(records: readonly ExtractionRecord[]): MergedActionItem[] {
  const merged = new Map<string, MergedActionItem>();

  for (const record of records) {
    for (const item of record.actionItems) {
      const key = normalizeKey(item.text);
      const existing = merged.get(key);

      if (!existing) {
        merged.set(key, { ...item, sourceMessageIds: [record.messageId] });
        continue;
      }

      if (PRIORITY_RANK[item.priority] < PRIORITY_RANK[existing.priority]) {
        existing.priority = item.priority;
      }
      existing.dueDate = existing.dueDate || item.dueDate;
      if (!existing.sourceMessageIds.includes(record.messageId)) {
        existing.sourceMessageIds.push(record.messageId);
      }
    }
  }

  return [...merged.values()].sort((a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ANNOUNCEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Flat, deduplicated announcements, minus any that merely repeat an event
 * title or an action item.
 */
export function collectAnnouncements(
  records: readonly ExtractionRecord[],
  events: readonly MergedEvent[],
  actionItems: readonly MergedActionItem[]
): string[] {
  const captured = new Set<string>([
    ...events.map((event) => normalizeKey(event.title)),
    ...actionItems.map((item) => normalizeKey(item.text)),
  ]);

  const seen = new Set<string>();
  const announcements: string[] = [];

  for (const record of records) {
    for (const announcement of record.announcements) {
      const text = announcement.trim();
      const key = normalizeKey(text);
      if (!key || seen.has(key) || captured.has(key)) {
        continue;
      }
      seen.add(key);
      announcements.push(text);
    }
  }

  return announcements;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATE RANGE
// ═══════════════════════════════════════════════════════════════════════════════

export function formatDay(date: Date): string {
  return format(date, 'MMM d, yyyy');
}

/**
 * Span of the records' received dates. Records with unreadable dates are
 * ignored; with none readable, `fallback` is used for both ends.
 */
export function computeDateRange(records: readonly ExtractionRecord[], fallback: Date): DateRange {
  const dates = records.map((record) => parseISO(record.receivedAt)).filter((date) => isValid(date));
  const start = dates.length > 0 ? min(dates) : fallback;
  const end = dates.length > 0 ? max(dates) : fallback;

  const startLabel = formatDay(start);
  const endLabel = formatDay(end);

  return {
    start: start.toISOString(),
    end: end.toISOString(),
    label: startLabel === endLabel ? startLabel : `${startLabel} to ${endLabel}`,
  };
}

/**
 * Summary used when the reasoning service cannot write one.
 *
 * @example
 * ```typescript
 * templateSummary(3, range);
 * // 'Digest covering 3 messages between Oct 20, 2025 and Oct 22, 2025; see individual summaries below.'
 * ```
 */
export function templateSummary(messageCount: number, range: DateRange): string {
  const start = formatDay(parseISO(range.start));
  const end = formatDay(parseISO(range.end));
  const noun = messageCount === 1 ? 'message' : 'messages';
  return `Digest covering ${messageCount} ${noun} between ${start} and ${end}; see individual summaries below.`;
}
