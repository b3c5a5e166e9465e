/**
 * Reasoning Service Client
 *
 * The pipeline talks to the reasoning service through `ReasoningService`:
 * one system prompt, one user text, optional images, one text reply.
 * `OpenAIReasoningService` implements it on the chat completions API in
 * JSON mode. Tests substitute an in-process fake.
 *
 * KEY BEHAVIOR:
 * - Every call is bounded by the profile's timeout
 * - SDK errors are mapped onto ServiceError so the retry policy can decide
 * - Token usage and estimated cost are logged per call
 * - The SDK's own retries are disabled; retry lives in lib/utils/retry
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { createLogger } from '@/lib/utils/logger';
import { calculateCost, type AIModel } from '@/config/analyzers';
import { ServiceError, kindFromStatus } from '@/lib/errors';

const logger = createLogger('OpenAIClient');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * An image sent alongside the user content.
 */
export interface ReasoningImage {
  /** Content id the body text refers to via `[image:<contentId>]` */
  contentId: string;
  mimeType: string;
  data: Buffer;
}

export interface ReasoningRequest {
  systemPrompt: string;
  userContent: string;
  images?: ReasoningImage[];
  /** Overrides the client's default response budget */
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Result from a reasoning-service call.
 */
export interface ReasoningResponse {
  /** Raw response text; expected to be a JSON object but never trusted */
  text: string;
  tokensInput: number;
  tokensOutput: number;
  tokensTotal: number;
  /** Estimated cost in USD */
  estimatedCost: number;
  durationMs: number;
}

/**
 * Boundary to the reasoning service.
 */
export interface ReasoningService {
  readonly model: string;
  complete(request: ReasoningRequest): Promise<ReasoningResponse>;
}

export interface OpenAIReasoningOptions {
  apiKey: string;
  model: AIModel;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Maps anything the SDK throws onto ServiceError.
 * The timeout class extends the connection class, so it is checked first.
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  const context = { service: 'openai' };

  if (error instanceof OpenAI.APIUserAbortError) {
    return new ServiceError('Reasoning call aborted', 'request', context);
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ServiceError('Reasoning service timed out', 'timeout', context);
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ServiceError(`Reasoning service unreachable: ${error.message}`, 'network', context);
  }
  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === 'number' ? error.status : undefined;
    const kind = status === undefined ? 'server' : kindFromStatus(status);
    return new ServiceError(`Reasoning service error: ${error.message}`, kind, context, status);
  }
  if (error instanceof Error) {
    return new ServiceError(error.message, 'network', context);
  }
  return new ServiceError(String(error), 'network', context);
}

// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reasoning service backed by OpenAI chat completions.
 *
 * @example
 * ```typescript
 * const service = new OpenAIReasoningService({
 *   apiKey: credentials.openaiApiKey,
 *   ...profile.ai,
 * });
 * const reply = await service.complete({ systemPrompt, userContent });
 * ```
 */
export class OpenAIReasoningService implements ReasoningService {
  public readonly model: AIModel;
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAIReasoningOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  public async complete(request: ReasoningRequest): Promise<ReasoningResponse> {
    const startTime = performance.now();
    const maxTokens = request.maxTokens ?? this.maxTokens;

    logger.debug('Calling OpenAI', {
      model: this.model,
      contentLength: request.userContent.length,
      imageCount: request.images?.length ?? 0,
      maxTokens,
    });

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: buildUserContent(request) },
    ];

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          max_tokens: maxTokens,
          response_format: { type: 'json_object' },
          messages,
        },
        { signal: request.signal }
      );
    } catch (error) {
      const mapped = toServiceError(error);
      logger.warn('OpenAI call failed', {
        model: this.model,
        kind: mapped.kind,
        status: mapped.statusCode,
        error: mapped.message,
        durationMs: Math.round(performance.now() - startTime),
      });
      throw mapped;
    }

    const choice = response.choices[0];
    const text = choice?.message.content ?? '';
    if (text.trim() === '') {
      throw new ServiceError('Reasoning service returned an empty response', 'invalid_response', {
        service: 'openai',
        finishReason: choice?.finish_reason,
      });
    }

    const tokensInput = response.usage?.prompt_tokens ?? 0;
    const tokensOutput = response.usage?.completion_tokens ?? 0;
    const tokensTotal = response.usage?.total_tokens ?? tokensInput + tokensOutput;
    const estimatedCost = calculateCost(this.model, tokensInput, tokensOutput);
    const durationMs = Math.round(performance.now() - startTime);

    if (choice?.finish_reason === 'length') {
      // The reply is cut off; the parser's fallback handles it.
      logger.warn('Response truncated due to max_tokens limit', {
        model: this.model,
        maxTokens,
        tokensOutput,
      });
    }

    return { text, tokensInput, tokensOutput, tokensTotal, estimatedCost, durationMs };
  }
}

/**
 * Plain string for text-only requests; otherwise a text part followed by
 * one labelled image part per image.
 */
function buildUserContent(request: ReasoningRequest): string | ChatCompletionContentPart[] {
  const images = request.images ?? [];
  if (images.length === 0) {
    return request.userContent;
  }

  const parts: ChatCompletionContentPart[] = [{ type: 'text', text: request.userContent }];
  for (const image of images) {
    parts.push({ type: 'text', text: `[image:${image.contentId}]` });
    parts.push({
      type: 'image_url',
      image_url: { url: `data:${image.mimeType};base64,${image.data.toString('base64')}` },
    });
  }
  return parts;
}
