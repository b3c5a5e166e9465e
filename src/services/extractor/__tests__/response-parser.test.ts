/**
 * Tests for reply parsing: decode ladder, lenient validation, multi-day
 * rule and fallback records.
 *
 * @module services/extractor/__tests__/response-parser.test
 */

import { describe, it, expect } from 'vitest';
import { makeMessage } from '@/__fixtures__/digest';
import { DEFAULT_SUMMARY, decodeJsonReply, isDateRange, parseExtractionReply } from '../response-parser';

const message = makeMessage();

describe('decodeJsonReply', () => {
  it('decodes a bare object', () => {
    expect(decodeJsonReply('{"summary":"Hi"}')).toEqual({ ok: true, value: { summary: 'Hi' } });
  });

  it('decodes the outermost braces inside prose', () => {
    expect(decodeJsonReply('Here you go: {"summary":"Hi"} Thanks!')).toEqual({ ok: true, value: { summary: 'Hi' } });
  });

  it('fails without braces', () => {
    expect(decodeJsonReply('no json here')).toEqual({ ok: false });
  });
});

describe('isDateRange', () => {
  it.each([
    ['2025-10-27', false],
    ['2025-10-27T18:00:00Z', false],
    ['October 27', false],
    ['To be announced', false],
    ['', false],
    ['Oct 27-30', true],
    ['2025-10-27 to 2025-10-30', true],
    ['Monday through Thursday', true],
    ['Oct 27 – 30', true],
    ['Oct 27 and 28', true],
    ['2025-10-7', false],
    ['10-27-2025', false],
    ['27-10-2025', false],
    ['10/27', false],
    ['Oct 28 (to be rescheduled if it rains)', false],
    ['Wednesday afternoon', false],
    ['10-27-2025 to 10-30-2025', true],
    ['Saturday & Sunday', true],
    ['Dec 1st-3rd', true],
  ])('%j → %s', (value, expected) => {
    expect(isDateRange(value)).toBe(expected);
  });
});

describe('parseExtractionReply', () => {
  it('returns a fallback record for prose instead of JSON', () => {
    const reply = "Sure! Here's the summary: the carnival is on Friday.";
    const record = parseExtractionReply(message, reply, 500);

    expect(record).toMatchObject({
      kind: 'fallback',
      reason: 'unparseable',
      messageId: 'msg-1',
      summary: reply,
      events: [],
      actionItems: [],
      importance: 'medium',
    });
  });

  it('caps the fallback summary at the excerpt length', () => {
    const record = parseExtractionReply(message, 'x'.repeat(900), 500);

    expect(record.summary).toHaveLength(500);
  });

  it('parses a wrapped reply leniently', () => {
    const reply = `Here you go:
{"summary":"Carnival on the 27th","events":[{"title":"Fall Carnival","date":"2025-10-27","priority":"HIGH"}],
"action_items":[{"text":"Send volunteer form","priority":"urgent","due_date":"2025-10-24"}],
"importance":"high","key_dates":["2025-10-27"]}
Thanks!`;

    expect(parseExtractionReply(message, reply, 500)).toEqual({
      kind: 'full',
      messageId: 'msg-1',
      subject: message.subject,
      sender: message.sender,
      receivedAt: message.receivedAt,
      summary: 'Carnival on the 27th',
      events: [
        {
          title: 'Fall Carnival',
          date: '2025-10-27',
          time: '',
          location: '',
          description: '',
          priority: 'high',
          scope: '',
        },
      ],
      actionItems: [{ text: 'Send volunteer form', priority: 'medium', dueDate: '2025-10-24' }],
      importance: 'high',
      keyDates: ['2025-10-27'],
      announcements: [],
    });
  });

  it('accepts camelCase fields and drops events without a title', () => {
    const reply = JSON.stringify({
      events: [{ date: '2025-10-27' }, { title: 'Picture Day', date: '2025-10-28' }],
      actionItems: [{ text: 'Order photos', priority: 'low' }],
      keyDates: ['2025-10-28'],
      important_announcements: ['New pickup lane opens Monday'],
    });
    const record = parseExtractionReply(message, reply, 500);

    expect(record.kind).toBe('full');
    expect(record.summary).toBe(DEFAULT_SUMMARY);
    expect(record.events.map((event) => event.title)).toEqual(['Picture Day']);
    expect(record.actionItems).toEqual([{ text: 'Order photos', priority: 'low' }]);
    expect(record.announcements).toEqual(['New pickup lane opens Monday']);
  });

  it('rejects a JSON value that is not an object', () => {
    expect(parseExtractionReply(message, '[1,2]', 500)).toMatchObject({ kind: 'fallback', reason: 'invalid_shape' });
  });

  it('keeps one entry per day of a multi-day event', () => {
    const days = ['2025-10-27', '2025-10-28', '2025-10-29', '2025-10-30'];
    const reply = JSON.stringify({
      summary: 'Book Fair runs Monday through Thursday.',
      events: days.map((date) => ({ title: 'Book Fair', date, location: 'Library' })),
      importance: 'medium',
    });
    const record = parseExtractionReply(message, reply, 500);

    expect(record.kind).toBe('full');
    expect(record.events.map((event) => event.date)).toEqual(days);
  });

  it('keeps a full record for an unpadded single-day date', () => {
    const reply = JSON.stringify({
      summary: 'Picture day is Tuesday.',
      events: [{ title: 'Picture Day', date: '2025-10-7' }],
      action_items: [{ text: 'Order photo package', priority: 'high' }],
    });
    const record = parseExtractionReply(message, reply, 500);

    expect(record.kind).toBe('full');
    expect(record.events.map((event) => event.date)).toEqual(['2025-10-7']);
    expect(record.actionItems).toEqual([{ text: 'Order photo package', priority: 'high' }]);
  });

  it('replaces a record holding a range date with the fallback, keeping its summary', () => {
    const reply = JSON.stringify({
      summary: 'Book Fair runs Monday through Thursday.',
      events: [{ title: 'Book Fair', date: 'Oct 27-30' }],
    });
    const record = parseExtractionReply(message, reply, 500);

    expect(record).toMatchObject({
      kind: 'fallback',
      reason: 'date_range',
      summary: 'Book Fair runs Monday through Thursday.',
      events: [],
      actionItems: [],
    });
  });
});
