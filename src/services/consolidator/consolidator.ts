/**
 * Consolidator
 *
 * Folds a batch of extraction records into one DigestRecord. Merging is
 * local and deterministic; only the executive summary comes from the
 * reasoning service, with a templated summary when the service fails or
 * replies with nothing usable.
 *
 * @module services/consolidator/consolidator
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { AIConfig, PromptConfig } from '@/config/profiles';
import type { ReasoningService } from '@/lib/ai/openai-client';
import { createLogger, logAI, type EnhancedLogger } from '@/lib/utils/logger';
import { runWithRetry, type RetryHooks, type RetryPolicy } from '@/lib/utils/retry';
import { stripMarkdown } from '@/lib/utils/text';
import { decodeJsonReply } from '@/services/extractor/response-parser';
import type { DigestRecord, DigestSource, ExtractionRecord } from '@/types/digest';
import { buildDigestSystemPrompt, buildDigestUserContent, type DigestPromptInput } from './digest-prompt';
import { collectAnnouncements, computeDateRange, mergeActionItems, mergeEvents, templateSummary } from './merge';

export interface ConsolidatorOptions {
  service: ReasoningService;
  prompts: PromptConfig;
  ai: Pick<AIConfig, 'digestMaxTokens' | 'digestInputChars'>;
  retry: RetryPolicy;
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
  logger?: EnhancedLogger;
  now?: () => Date;
  generateId?: () => string;
}

export interface ConsolidationOutcome {
  digest: DigestRecord;
  tokensUsed: number;
  estimatedCost: number;
}

const summaryReplySchema = z
  .object({
    executive_summary: z.string().optional(),
    executiveSummary: z.string().optional(),
  })
  .transform((reply) => (reply.executiveSummary ?? reply.executive_summary ?? '').trim());

interface SummaryResult {
  source: DigestRecord['summarySource'];
  text: string;
  tokensUsed: number;
  estimatedCost: number;
}

export class Consolidator {
  private readonly service: ReasoningService;
  private readonly prompts: PromptConfig;
  private readonly ai: Pick<AIConfig, 'digestMaxTokens' | 'digestInputChars'>;
  private readonly retry: RetryPolicy;
  private readonly retryHooks: Pick<RetryHooks, 'sleep' | 'random'>;
  private readonly logger: EnhancedLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: ConsolidatorOptions) {
    this.service = options.service;
    this.prompts = options.prompts;
    this.ai = options.ai;
    this.retry = options.retry;
    this.retryHooks = options.retryHooks ?? {};
    this.logger = options.logger ?? createLogger('Consolidator');
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Builds the digest for `records`, in the order given. Never called with an
   * empty batch: the pipeline skips consolidation when nothing is new.
   */
  public async consolidate(
    profile: string,
    records: readonly ExtractionRecord[],
    signal?: AbortSignal
  ): Promise<ConsolidationOutcome> {
    if (records.length === 0) {
      throw new Error('Cannot consolidate an empty batch');
    }

    const createdAt = this.now();
    const range = computeDateRange(records, createdAt);
    const events = mergeEvents(records);
    const actionItems = mergeActionItems(records);
    const announcements = collectAnnouncements(records, events, actionItems);

    const summary = await this.summarize({ range, events, actionItems, announcements, records }, signal);

    const sources: DigestSource[] = records.map((record) => ({
      messageId: record.messageId,
      subject: record.subject,
      sender: record.sender,
      receivedAt: record.receivedAt,
      summary: record.summary,
      importance: record.importance,
      kind: record.kind,
    }));

    const digest: DigestRecord = {
      digestId: this.generateId(),
      profile,
      createdAt: createdAt.toISOString(),
      dateRangeCovered: range,
      sourceMessageIds: records.map((record) => record.messageId),
      executiveSummary: summary.text,
      summarySource: summary.source,
      events,
      actionItems,
      announcements,
      sources,
    };

    this.logger.info('Digest consolidated', {
      digestId: digest.digestId,
      messages: records.length,
      events: events.length,
      actionItems: actionItems.length,
      summarySource: summary.source,
    });

    return { digest, tokensUsed: summary.tokensUsed, estimatedCost: summary.estimatedCost };
  }

  private async summarize(
    input: DigestPromptInput,
    signal?: AbortSignal
  ): Promise<SummaryResult> {
    const fallback = (): SummaryResult => ({
      source: 'template',
      text: templateSummary(input.records.length, input.range),
      tokensUsed: 0,
      estimatedCost: 0,
    });

    const request = {
      systemPrompt: buildDigestSystemPrompt(this.prompts),
      userContent: buildDigestUserContent(input, this.ai.digestInputChars),
      maxTokens: this.ai.digestMaxTokens,
      signal,
    };

    logAI.callStart({ model: this.service.model, purpose: 'digest' });

    const outcome = await runWithRetry(() => this.service.complete(request), this.retry, {
      ...this.retryHooks,
      onRetry: ({ attempt, delayMs, error }) =>
        this.logger.warn('Digest summary call failed, retrying', { attempt, delayMs, error: error.message }),
    });

    if (outcome.status === 'degraded') {
      logAI.callError({ purpose: 'digest', error: outcome.error.message, attempts: outcome.attempts });
      return fallback();
    }

    const response = outcome.value;
    logAI.callComplete({
      model: this.service.model,
      purpose: 'digest',
      tokensUsed: response.tokensTotal,
      estimatedCost: response.estimatedCost,
      durationMs: response.durationMs,
    });

    const decoded = decodeJsonReply(response.text);
    const parsed = decoded.ok ? summaryReplySchema.safeParse(decoded.value) : undefined;
    const text = parsed?.success ? stripMarkdown(parsed.data).trim() : '';

    if (!text) {
      this.logger.warn('Digest summary reply unusable, using template');
      return { ...fallback(), tokensUsed: response.tokensTotal, estimatedCost: response.estimatedCost };
    }

    return { source: 'service', text, tokensUsed: response.tokensTotal, estimatedCost: response.estimatedCost };
  }
}
