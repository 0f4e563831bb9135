import type { Decision, StrategyDiagnostics } from "@paperbot/shared";
import { z } from "zod";

import { type BotContext, buy, HOLD, PriceHistory, sell, type TradingStrategy } from "./strategy";

export const TrendFollowParamsSchema = z.object({
  stepQuote: z.number().positive().finite(),
  trendLength: z.number().int().min(2).max(50).default(3),
  cooldownCycles: z.number().int().min(0).max(1_000).default(3),
  historySize: z.number().int().min(2).max(1_000).default(10)
});
export type TrendFollowParams = z.infer<typeof TrendFollowParamsSchema>;

/**
 * Buys after `trendLength` strictly rising samples, sells after as many falling ones,
 * then sits out `cooldownCycles` cycles. Samples are the cycle prices this instance
 * has seen, not the raw feed window.
 */
export class TrendFollowStrategy implements TradingStrategy {
  readonly id = "trend_follow" as const;
  readonly name = "Trend Follow";
  readonly indicators: readonly string[] = [];

  private readonly history: PriceHistory;
  private cooldownRemaining = 0;
  private buys = 0;
  private sells = 0;
  private lastAction = "initialized";

  constructor(private readonly params: TrendFollowParams) {
    this.history = new PriceHistory(Math.max(params.historySize, params.trendLength));
  }

  get cooldown(): number {
    return this.cooldownRemaining;
  }

  decide(ctx: BotContext): Decision {
    this.history.push(ctx.currentPrice);

    if (this.cooldownRemaining > 0) {
      this.cooldownRemaining -= 1;
      this.lastAction = `cooldown (${this.cooldownRemaining})`;
      return HOLD;
    }

    if (!this.history.hasAtLeast(this.params.trendLength)) {
      this.lastAction = "warming up";
      return HOLD;
    }

    const recent = this.history.lastN(this.params.trendLength);
    if (isMonotonic(recent, (prev, next) => next > prev)) {
      this.cooldownRemaining = this.params.cooldownCycles;
      this.buys += 1;
      this.lastAction = `buy ${this.params.stepQuote.toFixed(2)}`;
      return buy(this.params.stepQuote);
    }

    if (isMonotonic(recent, (prev, next) => next < prev)) {
      this.cooldownRemaining = this.params.cooldownCycles;
      this.sells += 1;
      this.lastAction = `sell ${this.params.stepQuote.toFixed(2)}`;
      return sell(this.params.stepQuote);
    }

    this.lastAction = "no trend";
    return HOLD;
  }

  describe(): StrategyDiagnostics {
    return {
      lastAction: this.lastAction,
      buys: this.buys,
      sells: this.sells,
      details: { cooldownRemaining: this.cooldownRemaining, samples: this.history.length }
    };
  }
}

function isMonotonic(values: number[], step: (prev: number, next: number) => boolean): boolean {
  for (let i = 1; i < values.length; i += 1) {
    if (!step(values[i - 1], values[i])) return false;
  }
  return values.length > 1;
}
