/**
 * Token usage and cost accounting for one task.
 */

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
}

export interface ModelPricing {
  /** USD per million input tokens */
  input: number;
  /** USD per million output tokens */
  output: number;
}

export const MODEL_PRICING: Record<'haiku' | 'sonnet' | 'opus', ModelPricing> = {
  haiku: { input: 0.8, output: 4 },
  sonnet: { input: 3, output: 15 },
  opus: { input: 15, output: 75 },
};

const CACHE_WRITE_MULTIPLIER = 1.25;
const CACHE_READ_MULTIPLIER = 0.1;

export function pricingFor(model: string): ModelPricing {
  const lower = model.toLowerCase();
  if (lower.includes('haiku')) return MODEL_PRICING.haiku;
  if (lower.includes('opus')) return MODEL_PRICING.opus;
  return MODEL_PRICING.sonnet;
}

export function estimateCostUsd(model: string, usage: TokenUsage): number {
  const price = pricingFor(model);
  const perToken = (perMillion: number) => perMillion / 1_000_000;
  return (
    usage.inputTokens * perToken(price.input) +
    usage.outputTokens * perToken(price.output) +
    usage.cacheWriteTokens * perToken(price.input * CACHE_WRITE_MULTIPLIER) +
    usage.cacheReadTokens * perToken(price.input * CACHE_READ_MULTIPLIER)
  );
}

export const EMPTY_USAGE: Readonly<TokenUsage> = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  cacheReadTokens: 0,
  cacheWriteTokens: 0,
});

export interface CostSnapshot extends TokenUsage {
  modelCalls: number;
  usd: number;
  wallClockMs: number;
}

/**
 * Accumulates usage across every model call of a task. Owned by a single
 * ExecutionLoop run; sub-agents keep their own ledger.
 */
export class CostLedger {
  private usage: TokenUsage = { ...EMPTY_USAGE };
  private usd = 0;
  private modelCalls = 0;
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  record(model: string, usage: TokenUsage): number {
    const cost = estimateCostUsd(model, usage);
    this.usage = {
      inputTokens: this.usage.inputTokens + usage.inputTokens,
      outputTokens: this.usage.outputTokens + usage.outputTokens,
      cacheReadTokens: this.usage.cacheReadTokens + usage.cacheReadTokens,
      cacheWriteTokens: this.usage.cacheWriteTokens + usage.cacheWriteTokens,
    };
    this.usd += cost;
    this.modelCalls++;
    return cost;
  }

  snapshot(): CostSnapshot {
    return {
      ...this.usage,
      modelCalls: this.modelCalls,
      usd: this.usd,
      wallClockMs: this.now() - this.startedAt,
    };
  }
}
