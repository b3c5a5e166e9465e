/**
 * Tests for text and HTML helpers
 *
 * @module lib/utils/__tests__/text.test
 */

import { describe, it, expect } from 'vitest';
import { excerpt, fillTemplate, normalizeKey, stripMarkdown, truncateAtBoundary } from '../text';
import { findInlineImageIds, htmlToPlainText } from '../html';

// ═══════════════════════════════════════════════════════════════════════════════
// TRUNCATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('truncateAtBoundary', () => {
  it('returns short text untouched', () => {
    expect(truncateAtBoundary('Short note.', 100)).toEqual({
      text: 'Short note.',
      truncated: false,
      boundary: 'none',
    });
  });

  it('cuts at the last paragraph break before the limit', () => {
    expect(truncateAtBoundary('First para.\n\nSecond para runs long', 20)).toEqual({
      text: 'First para.',
      truncated: true,
      boundary: 'paragraph',
    });
  });

  it('cuts a 9000-char body at the paragraph break before a mid-sentence limit', () => {
    const firstParagraph = 'The bake sale starts at noon. '.repeat(250);
    const secondParagraph = 'Volunteers should bring labeled containers and a smile '.repeat(28);
    const body = `${firstParagraph}\n\n${secondParagraph}`;

    expect(body.length).toBeGreaterThan(9000);
    // Position 8000 lands inside the second paragraph, mid-sentence
    expect(body.slice(7990, 8010)).not.toContain('\n');

    const result = truncateAtBoundary(body, 8000);

    expect(result.boundary).toBe('paragraph');
    expect(result.text).toBe(firstParagraph.trimEnd());
    expect(result.text.length).toBeLessThan(8000);
  });

  it('falls back to the last sentence end', () => {
    expect(truncateAtBoundary('One. Two three four', 12)).toEqual({
      text: 'One.',
      truncated: true,
      boundary: 'sentence',
    });
  });

  it('falls back to the last word boundary', () => {
    expect(truncateAtBoundary('alpha beta gamma', 12)).toEqual({
      text: 'alpha beta',
      truncated: true,
      boundary: 'word',
    });
  });

  it('hard-cuts a single token longer than the limit', () => {
    expect(truncateAtBoundary('abcdefghij', 4)).toEqual({ text: 'abcd', truncated: true, boundary: 'hard' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SMALL HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

describe('text helpers', () => {
  it('excerpt trims and caps', () => {
    expect(excerpt('  hello world  ', 5)).toBe('hello');
  });

  it('normalizeKey folds case, whitespace and trailing punctuation', () => {
    expect(normalizeKey('  Sign the Permission   Slip. ')).toBe('sign the permission slip');
  });

  it('fillTemplate leaves unknown placeholders in place', () => {
    expect(fillTemplate('{profile} digest {x}', { profile: 'school' })).toBe('school digest {x}');
  });

  it('stripMarkdown removes headers and emphasis and turns bullets into dots', () => {
    expect(stripMarkdown('## Heading\n**bold** and *it*\n- item')).toBe('Heading\nbold and it\n• item');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// HTML
// ═══════════════════════════════════════════════════════════════════════════════

describe('htmlToPlainText', () => {
  it('keeps paragraphs, list items and link targets', () => {
    const html =
      '<html><head><title>x</title></head><body><h1>News</h1>' +
      '<p>Picture day is <b>Tuesday</b>.</p>' +
      '<ul><li>Bring forms</li><li>Wear uniform</li></ul>' +
      '<p>See <a href="https://example.com/info">details</a> &amp; more</p></body></html>';

    expect(htmlToPlainText(html)).toBe(
      'News\n\nPicture day is Tuesday.\n\n• Bring forms\n• Wear uniform\nSee details (https://example.com/info) & more'
    );
  });

  it('replaces cid images with markers', () => {
    expect(htmlToPlainText('<p>Hi <b>all</b></p><img src="cid:flyer@01">')).toBe('Hi all\n\n[image:flyer@01]');
  });

  it('drops scripts, styles and comments', () => {
    expect(htmlToPlainText('<style>p{color:red}</style><script>alert(1)</script><!-- hidden --><p>Visible</p>')).toBe(
      'Visible'
    );
  });

  it('leaves numeric references outside Unicode as written', () => {
    expect(htmlToPlainText('<p>Bake sale Friday &#99999999; bring cookies</p>')).toBe(
      'Bake sale Friday &#99999999; bring cookies'
    );
    expect(htmlToPlainText('<p>Lone &#xD800; half, dash &#8212; ok</p>')).toBe('Lone &#xD800; half, dash — ok');
  });

  it('lists inline image ids once each, in order', () => {
    expect(findInlineImageIds('<img src="cid:a@1"><img src=\'cid:b@2\'><img src="cid:a@1">')).toEqual(['a@1', 'b@2']);
  });
});
