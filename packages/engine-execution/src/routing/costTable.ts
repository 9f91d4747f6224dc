/**
 * Per-model token pricing.
 */

import type { ModelRate } from "@loopwright/engine-core";

/** Built-in USD rates per 1M tokens, keyed by a model id fragment */
export const DEFAULT_RATES: Readonly<Record<string, ModelRate>> = {
  opus: { inputPer1M: 15, outputPer1M: 75 },
  sonnet: { inputPer1M: 3, outputPer1M: 15 },
  haiku: { inputPer1M: 0.8, outputPer1M: 4 },
  "gpt-4o-mini": { inputPer1M: 0.15, outputPer1M: 0.6 },
  "gpt-4o": { inputPer1M: 2.5, outputPer1M: 10 },
};

const ZERO_RATE: ModelRate = { inputPer1M: 0, outputPer1M: 0 };

export function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

/**
 * Rate lookup. Exact ids win, then the longest matching fragment;
 * configured overrides take precedence over the built-in table.
 */
export class CostTable {
  private readonly rates: Record<string, ModelRate>;

  constructor(overrides: Record<string, ModelRate> = {}) {
    this.rates = { ...DEFAULT_RATES, ...overrides };
  }

  rateFor(model: string): ModelRate {
    const exact = this.rates[model];
    if (exact) {
      return exact;
    }

    const lower = model.toLowerCase();
    let best: { key: string; rate: ModelRate } | undefined;
    for (const [key, rate] of Object.entries(this.rates)) {
      if (lower.includes(key.toLowerCase()) && (!best || key.length > best.key.length)) {
        best = { key, rate };
      }
    }
    return best?.rate ?? ZERO_RATE;
  }

  cost(model: string, inputTokens: number, outputTokens: number): number {
    const rate = this.rateFor(model);
    return roundUsd(
      (inputTokens / 1_000_000) * rate.inputPer1M + (outputTokens / 1_000_000) * rate.outputPer1M
    );
  }
}
