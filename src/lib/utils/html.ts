/**
 * HTML to plain text.
 *
 * Regex-based conversion to readable paragraphs. Inline `cid:` images
 * become `[image:<contentId>]` markers matching the labels the extractor
 * puts on the images it sends.
 *
 * @module lib/utils/html
 */

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&ndash;': '–',
  '&mdash;': '—',
  '&rsquo;': '’',
  '&lsquo;': '‘',
  '&rdquo;': '”',
  '&ldquo;': '“',
  '&hellip;': '…',
};

/** Numeric references outside Unicode or inside the surrogate block stay as written */
function fromCodePoint(entity: string, code: number): string {
  const valid = Number.isInteger(code) && code <= 0x10ffff && (code < 0xd800 || code > 0xdfff);
  return valid ? String.fromCodePoint(code) : entity;
}

function decodeEntities(text: string): string {
  return text
    .replace(/&[a-z]+;|&#39;/gi, (entity) => ENTITIES[entity.toLowerCase()] ?? entity)
    .replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(entity, Number(code)))
    .replace(/&#x([0-9a-f]+);/gi, (entity, code: string) => fromCodePoint(entity, parseInt(code, 16)));
}

/**
 * Converts an HTML body to plain text with paragraph breaks preserved.
 *
 * @example
 * ```typescript
 * htmlToPlainText('<p>Hi <b>all</b></p><img src="cid:flyer@01">');
 * // 'Hi all\n\n[image:flyer@01]'
 * ```
 */
export function htmlToPlainText(html: string): string {
  const text = html
    // Remove head, style and script tags with content
    .replace(/<head[^>]*>[\s\S]*?<\/head>/gi, '')
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    // Inline images referenced by content id
    .replace(/<img[^>]+src=["']cid:([^"']+)["'][^>]*>/gi, '\n[image:$1]\n')
    // Source whitespace carries no meaning in HTML
    .replace(/[ \t\r\n]+/g, ' ')
    // Block elements become line/paragraph breaks
    .replace(/<\/p>/gi, '\n\n')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(div|tr|table|ul|ol)>/gi, '\n')
    .replace(/<\/h[1-6]>/gi, '\n\n')
    .replace(/<li[^>]*>/gi, '\n• ')
    .replace(/<\/(td|th)>/gi, ' ')
    // Links keep their target
    .replace(/<a[^>]+href="(https?:[^"]+)"[^>]*>([^<]+)<\/a>/gi, '$2 ($1)')
    // Remove all remaining HTML tags
    .replace(/<[^>]+>/g, '');

  return decodeEntities(text)
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n[ \t]+/g, '\n')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Content ids from `<img src="cid:...">` references, in document order.
 */
export function findInlineImageIds(html: string): string[] {
  const ids: string[] = [];
  for (const match of html.matchAll(/<img[^>]+src=["']cid:([^"']+)["']/gi)) {
    const id = match[1];
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}
