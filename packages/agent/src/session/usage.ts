import type { Usage } from '@parley/llm';
import { emptyUsage, usageAdd } from '@parley/llm';

/** USD per million tokens. */
export type ModelPricing = {
  readonly inputPerMillion: number;
  readonly outputPerMillion: number;
};

export const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = {
  'gemini-2.5-pro': { inputPerMillion: 1.25, outputPerMillion: 10.0 },
  'gemini-2.5-flash': { inputPerMillion: 0.15, outputPerMillion: 0.6 },
  'gemini-2.5-flash-lite': { inputPerMillion: 0.1, outputPerMillion: 0.4 },
  'gemini-2.0-flash': { inputPerMillion: 0.1, outputPerMillion: 0.4 },
};

const FALLBACK_MODEL = 'gemini-2.5-flash';

export type UsageRecord = {
  readonly model: string;
  readonly usage: Usage;
  readonly inputCost: number;
  readonly outputCost: number;
  readonly totalCost: number;
};

export type UsageSummary = {
  readonly usage: Usage;
  readonly requests: number;
  readonly totalCost: number;
  readonly elapsedMinutes: number;
  readonly costPerMinute: number;
};

export type UsageTracker = {
  readonly record: (model: string, usage: Usage) => UsageRecord;
  readonly summary: () => UsageSummary;
};

export type UsageTrackerOptions = {
  readonly pricing?: Readonly<Record<string, ModelPricing>>;
  readonly now?: () => number;
};

/**
 * Exact name first, then the longest table key the model name starts with
 * (versioned names such as `gemini-2.5-flash-001`), then the fallback.
 */
export function pricingFor(model: string, table: Readonly<Record<string, ModelPricing>>): ModelPricing {
  const exact = table[model];
  if (exact) {
    return exact;
  }

  const prefix = Object.keys(table)
    .filter((key) => model.startsWith(key))
    .sort((a, b) => b.length - a.length)[0];
  const byPrefix = prefix === undefined ? undefined : table[prefix];

  return byPrefix ?? table[FALLBACK_MODEL] ?? { inputPerMillion: 0, outputPerMillion: 0 };
}

export function createUsageTracker(options: UsageTrackerOptions = {}): UsageTracker {
  const pricing = options.pricing ?? MODEL_PRICING;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let total = emptyUsage();
  let totalCost = 0;
  let requests = 0;

  return {
    record(model: string, usage: Usage): UsageRecord {
      const price = pricingFor(model, pricing);
      const inputCost = (usage.inputTokens / 1_000_000) * price.inputPerMillion;
      const outputCost = (usage.outputTokens / 1_000_000) * price.outputPerMillion;

      total = usageAdd(total, usage);
      totalCost += inputCost + outputCost;
      requests += 1;

      return { model, usage, inputCost, outputCost, totalCost: inputCost + outputCost };
    },

    summary(): UsageSummary {
      const elapsedMinutes = (now() - startedAt) / 60_000;
      return {
        usage: total,
        requests,
        totalCost,
        elapsedMinutes,
        costPerMinute: elapsedMinutes > 0 ? totalCost / elapsedMinutes : 0,
      };
    },
  };
}
