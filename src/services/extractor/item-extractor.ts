/**
 * Per-Item Extractor
 *
 * One reasoning-service call per NormalizedMessage, wrapped in the bounded
 * retry policy. Always returns a record: a full one when the reply parses, a
 * fallback when it doesn't or when the service stays unavailable.
 *
 * @module services/extractor/item-extractor
 */

import { createLogger, logAI, type EnhancedLogger } from '@/lib/utils/logger';
import { runWithRetry, type RetryHooks, type RetryPolicy } from '@/lib/utils/retry';
import type { ReasoningService } from '@/lib/ai/openai-client';
import type { AIConfig, PromptConfig } from '@/config/profiles';
import type { ExtractionRecord, NormalizedMessage } from '@/types/digest';
import { buildExtractionSystemPrompt, buildExtractionUserContent } from './extraction-prompt';
import { buildFallbackRecord, parseExtractionReply } from './response-parser';

export interface ItemExtractorOptions {
  service: ReasoningService;
  prompts: PromptConfig;
  ai: Pick<AIConfig, 'excerptChars'>;
  retry: RetryPolicy;
  /** Injected sleep/random for tests */
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
  logger?: EnhancedLogger;
}

export interface ExtractionOutcome {
  record: ExtractionRecord;
  attempts: number;
  tokensUsed: number;
  estimatedCost: number;
}

/**
 * @example
 * ```typescript
 * const extractor = new ItemExtractor({ service, prompts: profile.prompts, ai: profile.ai, retry: profile.retry });
 * const { record } = await extractor.extract(message);
 * if (record.kind === 'fallback') logger.warn('Degraded', { reason: record.reason });
 * ```
 */
export class ItemExtractor {
  private readonly service: ReasoningService;
  private readonly systemPrompt: string;
  private readonly excerptChars: number;
  private readonly retry: RetryPolicy;
  private readonly retryHooks: Pick<RetryHooks, 'sleep' | 'random'>;
  private readonly logger: EnhancedLogger;

  constructor(options: ItemExtractorOptions) {
    this.service = options.service;
    this.systemPrompt = buildExtractionSystemPrompt(options.prompts);
    this.excerptChars = options.ai.excerptChars;
    this.retry = options.retry;
    this.retryHooks = options.retryHooks ?? {};
    this.logger = options.logger ?? createLogger('ItemExtractor');
  }

  public async extract(message: NormalizedMessage, signal?: AbortSignal): Promise<ExtractionOutcome> {
    const userContent = buildExtractionUserContent(message);
    const images = message.images.map(({ contentId, mimeType, data }) => ({ contentId, mimeType, data }));

    logAI.callStart({ model: this.service.model, purpose: 'extraction', messageId: message.id });

    const outcome = await runWithRetry(
      () => this.service.complete({ systemPrompt: this.systemPrompt, userContent, images, signal }),
      this.retry,
      {
        ...this.retryHooks,
        onRetry: ({ attempt, delayMs, error }) =>
          this.logger.warn('Extraction call failed, retrying', {
            messageId: message.id,
            attempt,
            delayMs,
            error: error.message,
          }),
      }
    );

    if (outcome.status === 'degraded') {
      logAI.callError({
        purpose: 'extraction',
        messageId: message.id,
        error: outcome.error.message,
        attempts: outcome.attempts,
      });

      return {
        record: buildFallbackRecord(message, {
          reason: 'service_unavailable',
          raw: outcome.error.message,
          excerptChars: this.excerptChars,
          summary: `Extraction unavailable: ${outcome.error.message}`,
        }),
        attempts: outcome.attempts,
        tokensUsed: 0,
        estimatedCost: 0,
      };
    }

    const response = outcome.value;
    logAI.callComplete({
      model: this.service.model,
      purpose: 'extraction',
      messageId: message.id,
      tokensUsed: response.tokensTotal,
      estimatedCost: response.estimatedCost,
      durationMs: response.durationMs,
    });

    const record = parseExtractionReply(message, response.text, this.excerptChars);
    if (record.kind === 'fallback') {
      this.logger.warn('Reply could not be used, recorded as fallback', {
        messageId: message.id,
        reason: record.reason,
      });
    } else {
      this.logger.debug('Extraction complete', {
        messageId: message.id,
        events: record.events.length,
        actionItems: record.actionItems.length,
      });
    }

    return {
      record,
      attempts: outcome.attempts,
      tokensUsed: response.tokensTotal,
      estimatedCost: response.estimatedCost,
    };
  }
}
