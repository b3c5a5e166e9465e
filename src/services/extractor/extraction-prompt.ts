/**
 * Extraction prompt.
 *
 * System prompt is built from the profile's prompt settings; the user content
 * carries one message plus its attachment text. The reply must be a bare JSON
 * object: no markdown fences, no prose around it.
 *
 * @module services/extractor/extraction-prompt
 */

import type { PromptConfig } from '@/config/profiles';
import type { NormalizedMessage } from '@/types/digest';

export function buildExtractionSystemPrompt(prompts: PromptConfig): string {
  const extra = prompts.extraExtractionInstructions
    ? `\n═══════════════════════════════════════════════════════════════════════════════
ADDITIONAL INSTRUCTIONS
═══════════════════════════════════════════════════════════════════════════════
${prompts.extraExtractionInstructions}\n`
    : '';

  return `You read ${prompts.scopeName} email for ${prompts.audience} and pull out what matters: ${prompts.focus}.

═══════════════════════════════════════════════════════════════════════════════
OUTPUT FORMAT
═══════════════════════════════════════════════════════════════════════════════

Reply with ONE raw JSON object and nothing else. No markdown code fences,
no explanation before or after it. The object has exactly these fields:

{
  "summary": "2-3 sentence plain-language summary of the email",
  "events": [
    {
      "title": "Event name",
      "date": "YYYY-MM-DD (one single day)",
      "time": "e.g. 6:30 PM, or empty string",
      "location": "place, or empty string",
      "description": "what to know, bring or do",
      "priority": "high | medium | low",
      "scope": "who it concerns (a grade, a group, or \\"all\\")"
    }
  ],
  "action_items": [
    { "text": "what to do", "priority": "high | medium | low", "due_date": "YYYY-MM-DD or omit" }
  ],
  "importance": "high | medium | low",
  "key_dates": ["YYYY-MM-DD", "..."],
  "announcements": ["Notable news that is neither an event nor an action item"]
}

═══════════════════════════════════════════════════════════════════════════════
MULTI-DAY EVENTS
═══════════════════════════════════════════════════════════════════════════════

An event that spans several days becomes one entry PER DAY, each with its own
single date. "Book Fair, Monday through Thursday, Oct 27-30" is FOUR entries:
2025-10-27, 2025-10-28, 2025-10-29 and 2025-10-30. Never put a range such as
"Oct 27-30" or "2025-10-27 to 2025-10-30" in a date field.

═══════════════════════════════════════════════════════════════════════════════
IMAGES AND ATTACHMENTS
═══════════════════════════════════════════════════════════════════════════════

Images may follow the text, each labelled [image:<id>]; the body marks where
they appeared with the same label. Flyers often hold the actual dates, so read
them. Attachment text, when present, follows the body.

═══════════════════════════════════════════════════════════════════════════════
RULES
═══════════════════════════════════════════════════════════════════════════════

- Use empty arrays when there are no events, action items, dates or announcements
- Resolve relative dates ("next Tuesday") against the email's date
- Do not invent details the email doesn't state
${extra}`;
}

/**
 * User content for one message.
 */
export function buildExtractionUserContent(message: NormalizedMessage): string {
  const sections = [
    `From: ${message.sender}`,
    `Subject: ${message.subject}`,
    `Date: ${message.receivedAt}`,
    '',
    message.bodyText || '(empty body)',
  ];

  if (message.bodyTruncated) {
    sections.push('', '[body truncated]');
  }

  for (const attachment of message.attachmentText) {
    if (attachment.status === 'extracted') {
      sections.push('', `--- Attachment: ${attachment.filename} ---`, attachment.text);
    }
  }

  return sections.join('\n');
}
