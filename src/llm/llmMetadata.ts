/**
 * LLM Response Metadata
 *
 * Provider-neutral view of a completion call: token usage, timing and an
 * estimated cost, so a design run can report what its iterations consumed.
 */

import type { RunUsage } from '../jobs/types';

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface LLMResponseMetadata {
  model: string;
  provider: 'openrouter' | 'unknown';

  usage?: TokenUsage;
  latencyMs?: number;

  estimatedCost?: number;
  costCurrency?: string;

  requestTimestamp: number;
  responseTimestamp?: number;

  success: boolean;
  error?: string;
}

export interface LLMResponse<T = string> {
  content: T;
  metadata: LLMResponseMetadata;
}

/**
 * USD per 1M tokens for the default designer and judge models.
 * Models missing from the table are reported with a zero cost.
 */
export const MODEL_PRICING: Record<string, { prompt: number; completion: number }> = {
  'qwen/qwen-2.5-coder-32b-instruct': { prompt: 0.07, completion: 0.16 },
  'qwen/qwen2.5-vl-72b-instruct': { prompt: 0.25, completion: 0.75 },
  'qwen/qwen2.5-vl-32b-instruct': { prompt: 0.2, completion: 0.6 },
  'openai/gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
  'openai/gpt-4o': { prompt: 2.5, completion: 10.0 },
  'google/gemini-2.0-flash-001': { prompt: 0.1, completion: 0.4 },
  'anthropic/claude-3.5-sonnet': { prompt: 3.0, completion: 15.0 },
  'meta-llama/llama-3.3-70b-instruct:free': { prompt: 0, completion: 0 },
};

export function calculateCost(usage: TokenUsage, model: string): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) {
    return 0;
  }

  const promptCost = ((usage.promptTokens || 0) * pricing.prompt) / 1_000_000;
  const completionCost = ((usage.completionTokens || 0) * pricing.completion) / 1_000_000;

  return promptCost + completionCost;
}

export function emptyRunUsage(): RunUsage {
  return { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0, estimatedCost: 0 };
}

/**
 * Fold one call's metadata into the running totals. Failed calls still
 * count as calls but carry no tokens.
 */
export function addUsage(total: RunUsage, metadata: LLMResponseMetadata | undefined): RunUsage {
  if (!metadata) return total;

  const usage = metadata.usage;
  return {
    calls: total.calls + 1,
    promptTokens: total.promptTokens + (usage?.promptTokens || 0),
    completionTokens: total.completionTokens + (usage?.completionTokens || 0),
    totalTokens: total.totalTokens + (usage?.totalTokens || 0),
    estimatedCost: total.estimatedCost + (metadata.estimatedCost || 0),
  };
}

export function createUnavailableMetadata(model: string, reason?: string): LLMResponseMetadata {
  return {
    model,
    provider: 'unknown',
    success: false,
    error: reason || 'Token usage data unavailable from provider',
    requestTimestamp: Date.now(),
  };
}
