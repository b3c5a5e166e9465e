/**
 * Tests for one pipeline run: skip-if-processed, per-message failure
 * isolation, profile isolation, abort, delivery and ledger failure.
 *
 * Uses the real normalizer, extractor, consolidator and SQLite ledger; the
 * mailbox, reasoning service, renderer and delivery sink are in-process fakes.
 *
 * @module services/pipeline/__tests__/digest-pipeline.test
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { LedgerError } from '@/lib/errors';
import { DEFAULT_RETRY_POLICY } from '@/lib/utils/retry';
import { LedgerStore } from '@/lib/ledger/ledger-store';
import { makeProfile, makeRawMessage } from '@/__fixtures__/digest';
import type { ProfileConfig } from '@/config/profiles';
import type { ReasoningRequest, ReasoningResponse, ReasoningService } from '@/lib/ai/openai-client';
import type {
  CandidateQuery,
  DeliveryRequest,
  DeliveryResult,
  DeliverySink,
  GmailMessage,
  MailboxSource,
  MessageHandle,
} from '@/lib/gmail/types';
import { ContentNormalizer } from '@/services/normalizer';
import { ItemExtractor } from '@/services/extractor';
import { Consolidator } from '@/services/consolidator';
import type { DocumentRenderer, RenderedDigest } from '@/services/render';
import type { DigestRecord } from '@/types/digest';
import { DigestPipeline, progressOf } from '../digest-pipeline';

// ═══════════════════════════════════════════════════════════════════════════════
// FAKES
// ═══════════════════════════════════════════════════════════════════════════════

const NOW = new Date('2025-10-23T12:00:00.000Z');
const RECEIVED = 'Mon, 20 Oct 2025 12:00:00 +0000';

class FakeMailbox implements MailboxSource {
  public readonly queries: CandidateQuery[] = [];
  public readonly fetched: string[] = [];
  public listError?: Error;
  public readonly failing = new Map<string, Error>();
  public onFetch?: (messageId: string) => void;
  private readonly messages: GmailMessage[];

  constructor(messages: GmailMessage[]) {
    this.messages = messages;
  }

  public async listCandidates(query: CandidateQuery): Promise<MessageHandle[]> {
    this.queries.push(query);
    if (this.listError) {
      throw this.listError;
    }
    return this.messages.map((message) => ({ id: message.id ?? '' }));
  }

  public async fetchMessage(messageId: string): Promise<GmailMessage> {
    this.fetched.push(messageId);
    this.onFetch?.(messageId);
    const failure = this.failing.get(messageId);
    if (failure) {
      throw failure;
    }
    const message = this.messages.find((candidate) => candidate.id === messageId);
    if (!message) {
      throw new Error(`No message ${messageId}`);
    }
    return message;
  }

  public async fetchAttachment(_messageId: string, _attachmentId: string): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}

/**
 * Answers extraction calls with a summary built from the subject line and
 * digest calls with a fixed executive summary.
 */
class RoutingReasoningService implements ReasoningService {
  public readonly model = 'gpt-4.1-mini';
  public readonly requests: ReasoningRequest[] = [];

  public async complete(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.requests.push(request);
    const subject = /^Subject: (.*)$/m.exec(request.userContent)?.[1] ?? '';
    const text = request.userContent.startsWith('PERIOD:')
      ? '{"executive_summary":"A quiet week."}'
      : JSON.stringify({ summary: `About ${subject}` });
    return { text, tokensInput: 80, tokensOutput: 20, tokensTotal: 100, estimatedCost: 0.001, durationMs: 3 };
  }

  public extractionCalls(): number {
    return this.requests.filter((request) => !request.userContent.startsWith('PERIOD:')).length;
  }
}

class RecordingRenderer implements DocumentRenderer {
  public readonly rendered: DigestRecord[] = [];
  public failure?: Error;

  public async render(record: DigestRecord): Promise<RenderedDigest> {
    if (this.failure) {
      throw this.failure;
    }
    this.rendered.push(record);
    return {
      path: `/digests/${record.digestId}.pdf`,
      filename: `${record.digestId}.pdf`,
      mimeType: 'application/pdf',
      content: Buffer.from('%PDF-fake'),
    };
  }
}

class RecordingSink implements DeliverySink {
  public readonly sent: DeliveryRequest[] = [];
  public failure?: Error;

  public async send(request: DeliveryRequest): Promise<DeliveryResult> {
    if (this.failure) {
      throw this.failure;
    }
    this.sent.push(request);
    return { messageId: `sent-${this.sent.length}` };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HARNESS
// ═══════════════════════════════════════════════════════════════════════════════

interface Harness {
  pipeline: DigestPipeline;
  ledger: LedgerStore;
  mailbox: FakeMailbox;
  service: RoutingReasoningService;
  renderer: RecordingRenderer;
  sink: RecordingSink;
}

function inbox(): GmailMessage[] {
  return [
    makeRawMessage({ id: 'm1', from: 'office@school.example', subject: 'Fall Carnival', date: RECEIVED, text: 'Carnival on the 27th.' }),
    makeRawMessage({ id: 'm2', from: 'office@school.example', subject: 'Picture Day', date: RECEIVED, text: 'Picture day is Tuesday.' }),
  ];
}

describe('DigestPipeline', () => {
  let dir: string;
  let open: LedgerStore[];
  let digestCounter: number;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'pipeline-test-'));
    open = [];
    digestCounter = 0;
  });

  afterEach(() => {
    for (const ledger of open) {
      ledger.close();
    }
    rmSync(dir, { recursive: true, force: true });
  });

  function createHarness(
    profile: ProfileConfig,
    messages: GmailMessage[] = inbox(),
    now: () => Date = () => NOW
  ): Harness {
    const ledger = LedgerStore.open(profile.ledger.path);
    open.push(ledger);
    const mailbox = new FakeMailbox(messages);
    const service = new RoutingReasoningService();
    const renderer = new RecordingRenderer();
    const sink = new RecordingSink();
    const retryHooks = { sleep: async () => {}, random: () => 0 };

    const pipeline = new DigestPipeline({
      profile,
      ledger,
      mailbox,
      normalizer: new ContentNormalizer(profile.processing, {
        fetchAttachment: (messageId, attachmentId) => mailbox.fetchAttachment(messageId, attachmentId),
      }),
      extractor: new ItemExtractor({ service, prompts: profile.prompts, ai: profile.ai, retry: DEFAULT_RETRY_POLICY, retryHooks }),
      consolidator: new Consolidator({
        service,
        prompts: profile.prompts,
        ai: profile.ai,
        retry: DEFAULT_RETRY_POLICY,
        retryHooks,
        now,
        generateId: () => `digest-${++digestCounter}`,
      }),
      renderer,
      delivery: sink,
      now,
    });

    return { pipeline, ledger, mailbox, service, renderer, sink };
  }

  it('extracts every new message, records it and produces one digest', async () => {
    const { pipeline, ledger, mailbox, renderer } = createHarness(makeProfile('school', dir));

    const report = await pipeline.run();

    expect(mailbox.queries[0]).toMatchObject({ label: 'school', since: new Date('2025-10-20T12:00:00.000Z') });
    expect(report).toMatchObject({
      profile: 'school',
      force: false,
      aborted: false,
      candidates: 2,
      alreadyProcessed: 0,
      extractedFull: 2,
      extractedFallback: 0,
      digestId: 'digest-1',
      artifactPath: '/digests/digest-1.pdf',
      delivery: 'disabled',
      tokensUsed: 300,
      errors: [],
    });
    expect(renderer.rendered[0]?.sourceMessageIds).toEqual(['m1', 'm2']);
    expect(renderer.rendered[0]?.executiveSummary).toBe('A quiet week.');
    expect(ledger.get('m1')?.record.summary).toBe('About Fall Carnival');
    expect(ledger.get('m1')?.digestId).toBe('digest-1');
    expect(ledger.getRecentDigests(1)[0]?.artifactPath).toBe('/digests/digest-1.pdf');
  });

  it('produces nothing new on an immediate second run', async () => {
    const { pipeline, service, renderer } = createHarness(makeProfile('school', dir));

    await pipeline.run();
    const second = await pipeline.run();

    expect(second).toMatchObject({ candidates: 2, alreadyProcessed: 2, extractedFull: 0, extractedFallback: 0 });
    expect(second.digestId).toBeUndefined();
    expect(service.extractionCalls()).toBe(2);
    expect(renderer.rendered).toHaveLength(1);
  });

  it('re-extracts already processed messages when forced', async () => {
    const { pipeline, ledger, service } = createHarness(makeProfile('school', dir));

    await pipeline.run();
    const forced = await pipeline.run({ force: true });

    expect(forced).toMatchObject({ force: true, alreadyProcessed: 0, extractedFull: 2, digestId: 'digest-2' });
    expect(service.extractionCalls()).toBe(4);
    expect(ledger.get('m2')?.digestId).toBe('digest-2');
  });

  it('skips messages that fail to fetch or normalize and records the rest', async () => {
    const messages: GmailMessage[] = [
      ...inbox(),
      makeRawMessage({ id: 'm3', subject: 'No sender', date: RECEIVED, text: 'Orphan' }),
      makeRawMessage({ id: 'm4', from: 'office@school.example', date: RECEIVED, text: 'Unreachable' }),
      { id: 'm5' },
    ];
    const { pipeline, ledger, mailbox } = createHarness(makeProfile('school', dir), messages);
    mailbox.failing.set('m4', new Error('mailbox timeout'));

    const report = await pipeline.run();

    expect(report).toMatchObject({ candidates: 5, extractedFull: 3, contentSkips: 1, fetchFailures: 1 });
    expect(report.errors).toEqual([
      { stage: 'fetch', messageId: 'm4', error: 'mailbox timeout' },
      { stage: 'normalize', messageId: 'm5', error: 'Message has no payload' },
    ]);
    expect(progressOf(report)).toEqual({ succeeded: 3, degraded: 0, skipped: 2 });
    expect(ledger.has('m1')).toBe(true);
    expect(ledger.has('m2')).toBe(true);
    expect(ledger.get('m3')?.record.sender).toBe('Unknown');
    expect(ledger.has('m4')).toBe(false);
    expect(ledger.has('m5')).toBe(false);
  });

  it('records a failed listing and produces no digest', async () => {
    const { pipeline, mailbox, renderer } = createHarness(makeProfile('school', dir));
    mailbox.listError = new Error('label not found');

    const report = await pipeline.run();

    expect(report.candidates).toBe(0);
    expect(report.errors).toEqual([{ stage: 'list', error: 'label not found' }]);
    expect(report.digestId).toBeUndefined();
    expect(renderer.rendered).toHaveLength(0);
  });

  it('leaves another profile untouched by a forced run', async () => {
    const school = createHarness(makeProfile('school', dir));
    const community = createHarness(makeProfile('community', dir), inbox(), () => new Date('2025-10-23T18:00:00.000Z'));

    await school.pipeline.run();
    const before = school.ledger.getStats(NOW);
    const processedAt = school.ledger.get('m1')?.processedAt;

    await community.pipeline.run();
    await community.pipeline.run({ force: true });

    expect(school.ledger.getStats(NOW)).toEqual(before);
    expect(school.ledger.get('m1')?.processedAt).toEqual(processedAt);
    expect(school.ledger.get('m1')?.digestId).toBe('digest-1');
    expect(community.ledger.get('m1')?.digestId).toBe('digest-3');
  });

  it('stops between messages when aborted and produces no digest', async () => {
    const controller = new AbortController();
    const messages = [
      ...inbox(),
      makeRawMessage({ id: 'm3', from: 'office@school.example', date: RECEIVED, text: 'Third' }),
    ];
    const { pipeline, ledger, mailbox, renderer } = createHarness(makeProfile('school', dir), messages);
    mailbox.onFetch = (messageId) => {
      if (messageId === 'm2') {
        controller.abort();
      }
    };

    const report = await pipeline.run({ signal: controller.signal });

    expect(report.aborted).toBe(true);
    expect(report.digestId).toBeUndefined();
    expect(renderer.rendered).toHaveLength(0);
    expect(mailbox.fetched).toEqual(['m1', 'm2']);
    expect(ledger.has('m1')).toBe(true);
    expect(ledger.has('m2')).toBe(false);
  });

  it('folds records left by an aborted run into the next digest', async () => {
    const controller = new AbortController();
    const messages = [
      ...inbox(),
      makeRawMessage({ id: 'm3', from: 'office@school.example', date: RECEIVED, text: 'Third' }),
    ];
    const { pipeline, ledger, mailbox, renderer } = createHarness(makeProfile('school', dir), messages);
    mailbox.onFetch = (messageId) => {
      if (messageId === 'm2') {
        controller.abort();
      }
    };
    await pipeline.run({ signal: controller.signal });
    mailbox.onFetch = undefined;

    const report = await pipeline.run();

    expect(report).toMatchObject({ alreadyProcessed: 1, extractedFull: 2, carriedOver: 1, digestId: 'digest-1' });
    expect([...(renderer.rendered[0]?.sourceMessageIds ?? [])].sort()).toEqual(['m1', 'm2', 'm3']);
    expect(ledger.get('m1')?.digestId).toBe('digest-1');
    expect(ledger.undigested()).toEqual([]);
  });

  it('waits for a new message before digesting leftover records', async () => {
    const controller = new AbortController();
    const { pipeline, ledger, mailbox, renderer } = createHarness(makeProfile('school', dir));
    mailbox.onFetch = (messageId) => {
      if (messageId === 'm2') {
        controller.abort();
      }
    };
    await pipeline.run({ signal: controller.signal });

    const quiet = createHarness(makeProfile('school', dir), inbox().slice(0, 1));
    const report = await quiet.pipeline.run();

    expect(report).toMatchObject({ alreadyProcessed: 1, carriedOver: 0 });
    expect(report.digestId).toBeUndefined();
    expect(renderer.rendered).toHaveLength(0);
    expect(quiet.renderer.rendered).toHaveLength(0);
    expect(ledger.undigested().map((entry) => entry.messageId)).toEqual(['m1']);
  });

  it('delivers the rendered digest when delivery is enabled', async () => {
    const profile = makeProfile('school', dir, { delivery: { enabled: true, recipient: 'family@example.com' } });
    const { pipeline, sink } = createHarness(profile);

    const report = await pipeline.run();

    expect(report.delivery).toBe('sent');
    expect(sink.sent).toHaveLength(1);
    expect(sink.sent[0]).toMatchObject({
      to: 'family@example.com',
      subject: 'school digest for Oct 20, 2025',
      attachments: [{ filename: 'digest-1.pdf', mimeType: 'application/pdf', content: Buffer.from('%PDF-fake') }],
    });
    expect(sink.sent[0]?.bodyText.startsWith('school digest: Oct 20, 2025\n\nA quiet week.')).toBe(true);
  });

  it('reports a failed delivery without failing the run', async () => {
    const profile = makeProfile('school', dir, { delivery: { enabled: true, recipient: 'family@example.com' } });
    const { pipeline, ledger, sink } = createHarness(profile);
    sink.failure = new Error('quota exceeded');

    const report = await pipeline.run();

    expect(report.delivery).toBe('failed');
    expect(report.errors).toEqual([{ stage: 'delivery', error: 'quota exceeded' }]);
    expect(ledger.getRecentDigests(1)).toHaveLength(1);
  });

  it('keeps the digest in the ledger when rendering fails', async () => {
    const profile = makeProfile('school', dir, { delivery: { enabled: true, recipient: 'family@example.com' } });
    const { pipeline, ledger, renderer, sink } = createHarness(profile);
    renderer.failure = new Error('disk full');

    const report = await pipeline.run();

    expect(report.errors).toEqual([{ stage: 'render', error: 'disk full' }]);
    expect(report.artifactPath).toBeUndefined();
    expect(report.delivery).toBe('skipped');
    expect(sink.sent).toHaveLength(0);
    expect(ledger.getRecentDigests(1)[0]?.artifactPath).toBeUndefined();
    expect(ledger.get('m1')?.digestId).toBe('digest-1');
  });

  it('raises LedgerError with the progress made so far', async () => {
    const { pipeline, ledger, mailbox } = createHarness(makeProfile('school', dir));
    mailbox.onFetch = (messageId) => {
      if (messageId === 'm2') {
        ledger.close();
      }
    };

    const failure = await pipeline.run().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(LedgerError);
    if (failure instanceof LedgerError) {
      expect(failure.context.progress).toEqual({ succeeded: 1, degraded: 0, skipped: 0 });
    }
  });
});
