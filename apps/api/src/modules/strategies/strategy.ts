import type { Decision, IndicatorSnapshot, PricePoint, StrategyDiagnostics, StrategyId } from "@paperbot/shared";

/**
 * Everything a strategy may look at during one cycle. Built fresh and frozen by the
 * scheduler; strategies must not keep a reference past `decide`.
 */
export type BotContext = Readonly<{
  /** Raw samples of the base asset, oldest first. */
  priceWindow: readonly PricePoint[];
  baseBalance: number;
  quoteBalance: number;
  /** Base priced in quote. */
  currentPrice: number;
  baseAsset: string;
  quoteAsset: string;
  /** 1 on the first cycle. */
  cycle: number;
  indicators: IndicatorSnapshot;
}>;

export interface TradingStrategy {
  readonly id: StrategyId;
  readonly name: string;
  /** Indicator ids the scheduler computes before each call to `decide`. */
  readonly indicators: readonly string[];
  decide(ctx: BotContext): Decision;
  describe(): StrategyDiagnostics;
}

export const HOLD: Decision = { action: "HOLD" };

export function buy(quoteAmount: number): Decision {
  return { action: "BUY", quoteAmount };
}

export function sell(quoteAmount: number): Decision {
  return { action: "SELL", quoteAmount };
}

/** Bounded memory of the latest prices a strategy has seen. */
export class PriceHistory {
  private readonly prices: number[] = [];

  constructor(private readonly maxSize: number) {}

  push(price: number): void {
    this.prices.push(price);
    if (this.prices.length > this.maxSize) this.prices.shift();
  }

  lastN(n: number): number[] {
    return this.prices.slice(Math.max(0, this.prices.length - n));
  }

  hasAtLeast(n: number): boolean {
    return this.prices.length >= n;
  }

  get length(): number {
    return this.prices.length;
  }
}
