/**
 * Executive Summary Prompt
 *
 * The service only writes the opening summary. Events, action items and
 * announcements are merged locally and handed over as context so the summary
 * matches what the digest lists.
 *
 * @module services/consolidator/digest-prompt
 */

import type { PromptConfig } from '@/config/profiles';
import { truncateAtBoundary } from '@/lib/utils/text';
import type { DateRange, ExtractionRecord, MergedActionItem, MergedEvent } from '@/types/digest';

// ═══════════════════════════════════════════════════════════════════════════════
// SYSTEM PROMPT
// ═══════════════════════════════════════════════════════════════════════════════

export function buildDigestSystemPrompt(prompts: PromptConfig): string {
  const extra = prompts.extraDigestInstructions ? `\n\nADDITIONAL INSTRUCTIONS:\n${prompts.extraDigestInstructions}` : '';

  return `You write the opening paragraph of a ${prompts.scopeName} digest for ${prompts.audience}.

Your task: Given the merged events, action items, announcements and per-email summaries below, write a short executive summary that tells the reader what matters most this period without reading every email.

RULES:
1. 2-4 sentences, plain language, specific (name the events and deadlines).
   GOOD: "Picture day is Tuesday and permission slips for the zoo trip are due Friday. The book fair runs all week."
   BAD: "There are several upcoming events."
2. Lead with anything high priority or due soon.
3. Only mention what appears in the input. Do not invent dates.
4. Reply with ONE raw JSON object and nothing else: {"executive_summary": "..."}${extra}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// USER CONTENT BUILDER
// ═══════════════════════════════════════════════════════════════════════════════

export interface DigestPromptInput {
  range: DateRange;
  events: readonly MergedEvent[];
  actionItems: readonly MergedActionItem[];
  announcements: readonly string[];
  records: readonly ExtractionRecord[];
}

/**
 * Renders the merged content as plain sections, capped at `maxChars`.
 */
export function buildDigestUserContent(input: DigestPromptInput, maxChars: number): string {
  const lines: string[] = [`PERIOD: ${input.range.label}`, `EMAILS: ${input.records.length}`, ''];

  lines.push('EVENTS:');
  if (input.events.length === 0) lines.push('(none)');
  for (const event of input.events) {
    const when = [event.date, event.time].filter(Boolean).join(' ');
    const where = event.location ? ` @ ${event.location}` : '';
    lines.push(`- [${event.priority}] ${event.title} (${when})${where}`);
  }

  lines.push('', 'ACTION ITEMS:');
  if (input.actionItems.length === 0) lines.push('(none)');
  for (const item of input.actionItems) {
    const due = item.dueDate ? ` (due ${item.dueDate})` : '';
    lines.push(`- [${item.priority}] ${item.text}${due}`);
  }

  lines.push('', 'ANNOUNCEMENTS:');
  if (input.announcements.length === 0) lines.push('(none)');
  for (const announcement of input.announcements) {
    lines.push(`- ${announcement}`);
  }

  lines.push('', 'EMAIL SUMMARIES:');
  for (const record of input.records) {
    lines.push(`- ${record.subject} [${record.importance}]: ${record.summary}`);
  }

  return truncateAtBoundary(lines.join('\n'), maxChars).text;
}
