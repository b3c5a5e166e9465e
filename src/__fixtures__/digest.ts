/**
 * Shared test data: builders for messages, records and fake collaborators.
 */

import type { ReasoningRequest, ReasoningResponse, ReasoningService } from '@/lib/ai/openai-client';
import type { ProfileConfig } from '@/config/profiles';
import type { GmailHeader, GmailMessage } from '@/lib/gmail/types';
import { parseProfileFile } from '@/config/profiles';
import type {
  DigestEvent,
  ExtractionRecord,
  FullExtraction,
  NormalizedMessage,
} from '@/types/digest';

export function makeMessage(overrides: Partial<NormalizedMessage> = {}): NormalizedMessage {
  return {
    id: 'msg-1',
    subject: 'Fall Carnival this month',
    sender: 'Front Office <office@school.example>',
    receivedAt: '2025-10-20T12:00:00.000Z',
    bodyText: 'Join us for the Fall Carnival on October 27 at 5 PM in the gym.',
    bodyTruncated: false,
    images: [],
    attachmentText: [],
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<DigestEvent> = {}): DigestEvent {
  return {
    title: 'Fall Carnival',
    date: '2025-10-27',
    time: '5:00 PM',
    location: 'Gym',
    description: 'Games and food trucks',
    priority: 'medium',
    scope: 'all',
    ...overrides,
  };
}

export function makeFullRecord(overrides: Partial<FullExtraction> = {}): FullExtraction {
  return {
    kind: 'full',
    messageId: 'msg-1',
    subject: 'Fall Carnival this month',
    sender: 'Front Office <office@school.example>',
    receivedAt: '2025-10-20T12:00:00.000Z',
    summary: 'The Fall Carnival is on October 27.',
    events: [makeEvent()],
    actionItems: [],
    importance: 'medium',
    keyDates: ['2025-10-27'],
    announcements: [],
    ...overrides,
  };
}

export function fallbackRecord(messageId: string, summary = 'Could not parse'): ExtractionRecord {
  return {
    kind: 'fallback',
    reason: 'unparseable',
    rawExcerpt: summary,
    messageId,
    subject: `Subject ${messageId}`,
    sender: 'someone@example.com',
    receivedAt: '2025-10-21T12:00:00.000Z',
    summary,
    events: [],
    actionItems: [],
    importance: 'medium',
    keyDates: [],
    announcements: [],
  };
}

/**
 * Reasoning service that replays scripted replies (or throws scripted
 * errors) in order and records every request.
 */
export class ScriptedReasoningService implements ReasoningService {
  public readonly model = 'gpt-4.1-mini';
  public readonly requests: ReasoningRequest[] = [];
  private readonly script: Array<string | Error>;

  constructor(script: Array<string | Error>) {
    this.script = [...script];
  }

  public async complete(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.requests.push(request);
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error('ScriptedReasoningService ran out of replies');
    }
    if (next instanceof Error) {
      throw next;
    }
    return {
      text: next,
      tokensInput: 100,
      tokensOutput: 50,
      tokensTotal: 150,
      estimatedCost: 0.0001,
      durationMs: 5,
    };
  }
}

/**
 * A fully-defaulted profile rooted at `baseDir`.
 */
export function makeProfile(name: string, baseDir: string, overrides: Record<string, unknown> = {}): ProfileConfig {
  const file = parseProfileFile(
    {
      profiles: {
        [name]: {
          label: name,
          prompts: { scopeName: 'elementary school' },
          ledger: { path: `${name}/ledger.db` },
          output: { directory: `${name}/out` },
          ...overrides,
        },
      },
    },
    baseDir
  );
  const profile = file.profiles.get(name);
  if (!profile) {
    throw new Error(`profile ${name} missing`);
  }
  return profile;
}

export interface RawMessageOptions {
  id: string;
  from?: string;
  subject?: string;
  date?: string;
  text?: string;
  html?: string;
}

/**
 * A raw Gmail message with a single text/plain or multipart/alternative body.
 */
export function makeRawMessage(options: RawMessageOptions): GmailMessage {
  const headers: GmailHeader[] = [];
  if (options.from !== undefined) {
    headers.push({ name: 'From', value: options.from });
  }
  headers.push({ name: 'Subject', value: options.subject ?? `Subject ${options.id}` });
  if (options.date !== undefined) {
    headers.push({ name: 'Date', value: options.date });
  }

  const plain = {
    mimeType: 'text/plain',
    body: { data: Buffer.from(options.text ?? '').toString('base64url') },
  };
  const payload =
    options.html === undefined
      ? { ...plain, headers }
      : {
          mimeType: 'multipart/alternative',
          headers,
          parts: [plain, { mimeType: 'text/html', body: { data: Buffer.from(options.html).toString('base64url') } }],
        };

  return { id: options.id, internalDate: String(Date.parse('2025-10-20T12:00:00.000Z')), payload };
}

/**
 * Smallest buffer image-size reads as a PNG of the given dimensions.
 */
export function pngBuffer(width: number, height: number): Buffer {
  const buffer = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buffer, 0);
  buffer.writeUInt32BE(13, 8);
  buffer.write('IHDR', 12, 'ascii');
  buffer.writeUInt32BE(width, 16);
  buffer.writeUInt32BE(height, 20);
  return buffer;
}
