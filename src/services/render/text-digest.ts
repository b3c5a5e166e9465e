/**
 * Plain-text digest, used as the delivery email body and as the line
 * source for the PDF renderer.
 *
 * @module services/render/text-digest
 */

import { format, isValid, parseISO } from 'date-fns';
import { stripMarkdown } from '@/lib/utils/text';
import type { DigestRecord, MergedActionItem, MergedEvent } from '@/types/digest';

/**
 * "Mon, Oct 27" for ISO dates; anything else is shown as written.
 */
export function formatEventDate(date: string): string {
  const parsed = parseISO(date.trim());
  return isValid(parsed) ? format(parsed, 'EEE, MMM d') : date.trim() || 'Date TBD';
}

export function digestTitle(record: DigestRecord): string {
  return `${record.profile} digest: ${record.dateRangeCovered.label}`;
}

/**
 * One-line event heading.
 *
 * @example
 * ```typescript
 * formatEventLine({ title: 'Fall Carnival', date: '2025-10-27', time: '5:00 PM', location: 'Gym', ... });
 * // 'Mon, Oct 27 · 5:00 PM · Fall Carnival @ Gym'
 * ```
 */
export function formatEventLine(event: MergedEvent): string {
  const when = [formatEventDate(event.date), event.time].filter(Boolean).join(' · ');
  const where = event.location ? ` @ ${event.location}` : '';
  return `${when} · ${event.title}${where}`;
}

export function formatActionItemLine(item: MergedActionItem): string {
  const due = item.dueDate ? ` (due ${formatEventDate(item.dueDate)})` : '';
  return `[${item.priority.toUpperCase()}] ${item.text}${due}`;
}

export function renderTextDigest(record: DigestRecord): string {
  const lines: string[] = [digestTitle(record), '', stripMarkdown(record.executiveSummary)];

  if (record.events.length > 0) {
    lines.push('', 'EVENTS');
    for (const event of record.events) {
      lines.push(`- ${formatEventLine(event)}`);
      if (event.description) {
        lines.push(`  ${event.description}`);
      }
    }
  }

  if (record.actionItems.length > 0) {
    lines.push('', 'ACTION ITEMS');
    for (const item of record.actionItems) {
      lines.push(`- ${formatActionItemLine(item)}`);
    }
  }

  if (record.announcements.length > 0) {
    lines.push('', 'ANNOUNCEMENTS');
    for (const announcement of record.announcements) {
      lines.push(`- ${announcement}`);
    }
  }

  lines.push('', 'MESSAGES');
  for (const source of record.sources) {
    lines.push(`- [${source.kind}] ${source.subject}, from ${source.sender}`);
    lines.push(`  ${stripMarkdown(source.summary)}`);
  }

  return lines.join('\n');
}
