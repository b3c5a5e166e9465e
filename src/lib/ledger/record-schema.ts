/**
 * zod schemas for records read back from the ledger.
 *
 * Rows are written by this program, so a row that fails validation means a
 * corrupt or foreign store and is reported as LedgerError by the caller.
 *
 * @module lib/ledger/record-schema
 */

import { z } from 'zod';

export const prioritySchema = z.enum(['high', 'medium', 'low']);

const eventSchema = z.object({
  title: z.string(),
  date: z.string(),
  time: z.string(),
  location: z.string(),
  description: z.string(),
  priority: prioritySchema,
  scope: z.string(),
});

const actionItemSchema = z.object({
  text: z.string(),
  priority: prioritySchema,
  dueDate: z.string().optional(),
});

const baseSchema = z.object({
  messageId: z.string().min(1),
  subject: z.string(),
  sender: z.string(),
  receivedAt: z.string(),
  summary: z.string().min(1),
  importance: prioritySchema,
  keyDates: z.array(z.string()),
  announcements: z.array(z.string()),
});

export const storedRecordSchema = z.discriminatedUnion('kind', [
  baseSchema.extend({
    kind: z.literal('full'),
    events: z.array(eventSchema),
    actionItems: z.array(actionItemSchema),
  }),
  baseSchema.extend({
    kind: z.literal('fallback'),
    reason: z.enum(['unparseable', 'invalid_shape', 'date_range', 'service_unavailable']),
    rawExcerpt: z.string(),
    events: z.tuple([]),
    actionItems: z.tuple([]),
  }),
]);

const sourceIdsSchema = z.array(z.string());

export const storedDigestSchema = z.object({
  digestId: z.string().min(1),
  profile: z.string(),
  createdAt: z.string(),
  dateRangeCovered: z.object({ start: z.string(), end: z.string(), label: z.string() }),
  sourceMessageIds: sourceIdsSchema,
  executiveSummary: z.string(),
  summarySource: z.enum(['service', 'template']),
  events: z.array(eventSchema.extend({ sourceMessageIds: sourceIdsSchema })),
  actionItems: z.array(actionItemSchema.extend({ sourceMessageIds: sourceIdsSchema })),
  announcements: z.array(z.string()),
  sources: z.array(
    z.object({
      messageId: z.string(),
      subject: z.string(),
      sender: z.string(),
      receivedAt: z.string(),
      summary: z.string(),
      importance: prioritySchema,
      kind: z.enum(['full', 'fallback']),
    })
  ),
});
