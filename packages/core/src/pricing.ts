// Per-model cost estimation from exact token counts.
//
// Ships defaults for known OpenAI models. Callers can override or add models.
// Falls back to a conservative mid-tier rate ($1/M input, $5/M output) with a
// log warning when the model is unknown.
//
// Cache-aware: cached input tokens are priced at the per-model discount
// instead of the full input price.

import type { Logger, Usage } from "./types";

export interface ModelPricing {
  readonly inputPer1MTokens: number;
  readonly outputPer1MTokens: number;
  /** Multiplier for cached input tokens (e.g. 0.25 = 75% cheaper than input). */
  readonly cacheReadDiscount?: number;
}

const FALLBACK_PRICING: ModelPricing = {
  inputPer1MTokens: 1.0,
  outputPer1MTokens: 5.0,
};

const DEFAULT_PRICING: Record<string, ModelPricing> = {
  // cached input at 25% of input rate
  "gpt-4.1":      { inputPer1MTokens: 2.00,  outputPer1MTokens: 8.00,  cacheReadDiscount: 0.25 },
  "gpt-4.1-mini": { inputPer1MTokens: 0.40,  outputPer1MTokens: 1.60,  cacheReadDiscount: 0.25 },
  "gpt-4.1-nano": { inputPer1MTokens: 0.10,  outputPer1MTokens: 0.40,  cacheReadDiscount: 0.25 },
  "o3":           { inputPer1MTokens: 10.00, outputPer1MTokens: 40.00, cacheReadDiscount: 0.25 },
  "o4-mini":      { inputPer1MTokens: 1.10,  outputPer1MTokens: 4.40,  cacheReadDiscount: 0.25 },

  // cached input at 50% of input rate
  "gpt-4o-mini":  { inputPer1MTokens: 0.15,  outputPer1MTokens: 0.60,  cacheReadDiscount: 0.5 },
  "gpt-4o":       { inputPer1MTokens: 2.50,  outputPer1MTokens: 10.00, cacheReadDiscount: 0.5 },
};

export class PricingLookup {
  private readonly merged: Map<string, ModelPricing>;
  private readonly warnedModels = new Set<string>();

  constructor(
    private readonly logger: Logger,
    overrides?: Record<string, ModelPricing>,
  ) {
    this.merged = new Map(Object.entries({ ...DEFAULT_PRICING, ...overrides }));
  }

  has(model: string): boolean {
    return this.merged.has(model);
  }

  /** Estimated cost in USD of one usage report. */
  estimate(model: string, usage: Usage): number {
    const pricing = this.merged.get(model);

    if (!pricing) {
      if (!this.warnedModels.has(model)) {
        this.warnedModels.add(model);
        this.logger.warn("Unknown model for cost estimation, using fallback rate", {
          model,
          fallbackInput: `$${FALLBACK_PRICING.inputPer1MTokens}/M`,
          fallbackOutput: `$${FALLBACK_PRICING.outputPer1MTokens}/M`,
        });
      }
      return estimateFromPricing(FALLBACK_PRICING, usage);
    }

    return estimateFromPricing(pricing, usage);
  }
}

function estimateFromPricing(p: ModelPricing, usage: Usage): number {
  const cached = Math.min(usage.cachedInputTokens ?? 0, usage.inputTokens);
  const uncachedInput = usage.inputTokens - cached;
  const inputRate = p.inputPer1MTokens;

  return (uncachedInput / 1_000_000) * inputRate
       + (cached / 1_000_000) * inputRate * (p.cacheReadDiscount ?? 1.0)
       + (usage.outputTokens / 1_000_000) * p.outputPer1MTokens;
}
