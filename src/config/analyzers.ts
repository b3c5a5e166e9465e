/**
 * Reasoning Model Configuration
 *
 * Models a profile may name, with per-token pricing for cost logging.
 * Profiles pick the model; temperature and token limits also come from the
 * profile so each scope can be tuned separately.
 */

/**
 * Models the digest pipeline is priced for.
 */
export const AI_MODELS = ['gpt-4.1-mini', 'gpt-4.1', 'gpt-4o-mini', 'gpt-4o'] as const;

export type AIModel = (typeof AI_MODELS)[number];

/**
 * Pricing per token (USD).
 *
 * - gpt-4.1-mini: $0.40 in / $1.60 out per 1M tokens
 * - gpt-4.1:      $2.00 in / $8.00 out per 1M tokens
 * - gpt-4o-mini:  $0.15 in / $0.60 out per 1M tokens
 * - gpt-4o:       $2.50 in / $10.00 out per 1M tokens
 */
export const MODEL_PRICING: Record<AIModel, { input: number; output: number }> = {
  'gpt-4.1-mini': {
    input: 0.4 / 1_000_000,
    output: 1.6 / 1_000_000,
  },
  'gpt-4.1': {
    input: 2.0 / 1_000_000,
    output: 8.0 / 1_000_000,
  },
  'gpt-4o-mini': {
    input: 0.15 / 1_000_000,
    output: 0.6 / 1_000_000,
  },
  'gpt-4o': {
    input: 2.5 / 1_000_000,
    output: 10.0 / 1_000_000,
  },
};

/**
 * Calculate estimated cost for an API call.
 *
 * @example
 * ```typescript
 * const cost = calculateCost('gpt-4o-mini', 500, 100);
 * // cost = 0.000075 (input) + 0.00006 (output) = $0.000135
 * ```
 */
export function calculateCost(model: AIModel, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model];
  return inputTokens * pricing.input + outputTokens * pricing.output;
}
