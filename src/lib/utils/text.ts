/**
 * Text helpers shared by the normalizer, extractor and renderers.
 *
 * @module lib/utils/text
 */

/**
 * Result of a boundary-aware truncation.
 */
export interface TruncationResult {
  text: string;
  truncated: boolean;
  /** Which boundary the cut landed on */
  boundary: 'none' | 'paragraph' | 'sentence' | 'word' | 'hard';
}

const PARAGRAPH_BREAK = /\n[ \t]*\n/g;
const SENTENCE_END = /[.!?]["')\]]?(?=\s)/g;

/**
 * Cuts `text` to at most `maxChars` code units without splitting a
 * paragraph mid-sentence.
 *
 * Preference order: last paragraph break before the limit, then last
 * sentence end, then last whitespace. Only a single unbroken token
 * longer than the limit is hard-cut.
 *
 * @example
 * ```typescript
 * truncateAtBoundary('First para.\n\nSecond para runs long', 20);
 * // { text: 'First para.', truncated: true, boundary: 'paragraph' }
 * ```
 */
export function truncateAtBoundary(text: string, maxChars: number): TruncationResult {
  if (text.length <= maxChars) {
    return { text, truncated: false, boundary: 'none' };
  }

  // Look at one char past the limit so a break sitting exactly at the
  // limit still counts.
  const window = text.slice(0, maxChars + 1);

  const paragraphCut = lastMatchIndex(window, PARAGRAPH_BREAK);
  if (paragraphCut > 0) {
    return { text: window.slice(0, paragraphCut).trimEnd(), truncated: true, boundary: 'paragraph' };
  }

  const sentenceEnd = lastMatchEnd(window, SENTENCE_END);
  if (sentenceEnd > 0 && sentenceEnd <= maxChars) {
    return { text: window.slice(0, sentenceEnd).trimEnd(), truncated: true, boundary: 'sentence' };
  }

  const space = window.search(/\s\S*$/);
  if (space > 0) {
    return { text: window.slice(0, space).trimEnd(), truncated: true, boundary: 'word' };
  }

  return { text: text.slice(0, maxChars), truncated: true, boundary: 'hard' };
}

function lastMatchIndex(text: string, pattern: RegExp): number {
  let index = -1;
  for (const match of text.matchAll(pattern)) {
    index = match.index ?? index;
  }
  return index;
}

function lastMatchEnd(text: string, pattern: RegExp): number {
  let end = -1;
  for (const match of text.matchAll(pattern)) {
    if (match.index !== undefined) {
      end = match.index + match[0].length;
    }
  }
  return end;
}

/**
 * Caps a string at `maxChars`, trimming whitespace. Used for excerpts
 * where a boundary-aware cut isn't worth it.
 */
export function excerpt(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length <= maxChars ? trimmed : trimmed.slice(0, maxChars).trimEnd();
}

/**
 * Comparison key: lowercase, collapsed whitespace, no trailing
 * punctuation. "Sign the Permission Slip. " and "sign the permission
 * slip" share a key.
 */
export function normalizeKey(value: string): string {
  return value
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.!?,;:]+$/, '')
    .trim();
}

/**
 * Fills `{name}` placeholders. Unknown placeholders are left as-is.
 *
 * @example
 * ```typescript
 * fillTemplate('{profile} digest for {date}', { profile: 'hoa', date: 'Oct 3' });
 * // 'hoa digest for Oct 3'
 * ```
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);
}

/**
 * Removes markdown emphasis and headers so service prose reads cleanly
 * in the rendered document.
 */
export function stripMarkdown(text: string): string {
  return text
    .replace(/^#{1,6}\s+/gm, '')
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/__([^_]+)__/g, '$1')
    .replace(/^\s*[-*+]\s+/gm, '• ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
