import type { IndicatorSnapshot } from "@paperbot/shared";
import { describe, expect, it } from "vitest";

import { CrossoverStrategy } from "./crossover.strategy";
import { buildStrategy, listStrategies } from "./strategy-catalog";
import type { BotContext } from "./strategy";
import { ThresholdOscillatorStrategy } from "./threshold-oscillator.strategy";
import { TrendFollowStrategy } from "./trend-follow.strategy";

function ctx(overrides: Partial<BotContext> = {}): BotContext {
  return {
    priceWindow: [],
    baseBalance: 0,
    quoteBalance: 10_000,
    currentPrice: 100,
    baseAsset: "BTC",
    quoteAsset: "USD",
    cycle: 1,
    indicators: {},
    ...overrides
  };
}

function atPrice(price: number): BotContext {
  return ctx({ currentPrice: price });
}

function withIndicators(cycle: number, indicators: IndicatorSnapshot): BotContext {
  return ctx({ cycle, indicators });
}

describe("TrendFollowStrategy", () => {
  const params = { stepQuote: 100, trendLength: 3, cooldownCycles: 3, historySize: 10 };

  it("buys on three rising prices", () => {
    const strategy = new TrendFollowStrategy(params);
    expect(strategy.decide(atPrice(100))).toEqual({ action: "HOLD" });
    expect(strategy.decide(atPrice(105))).toEqual({ action: "HOLD" });
    expect(strategy.decide(atPrice(110))).toEqual({ action: "BUY", quoteAmount: 100 });
    expect(strategy.cooldown).toBe(3);
  });

  it("sells on three falling prices", () => {
    const strategy = new TrendFollowStrategy(params);
    strategy.decide(atPrice(110));
    strategy.decide(atPrice(105));
    expect(strategy.decide(atPrice(100))).toEqual({ action: "SELL", quoteAmount: 100 });
  });

  it("holds through the cooldown and can trade again afterwards", () => {
    const strategy = new TrendFollowStrategy(params);
    strategy.decide(atPrice(100));
    strategy.decide(atPrice(105));
    strategy.decide(atPrice(110));

    expect(strategy.decide(atPrice(115))).toEqual({ action: "HOLD" });
    expect(strategy.decide(atPrice(120))).toEqual({ action: "HOLD" });
    expect(strategy.decide(atPrice(125))).toEqual({ action: "HOLD" });
    expect(strategy.cooldown).toBe(0);
    expect(strategy.decide(atPrice(130))).toEqual({ action: "BUY", quoteAmount: 100 });
    expect(strategy.describe().buys).toBe(2);
  });

  it("holds on mixed moves", () => {
    const strategy = new TrendFollowStrategy(params);
    strategy.decide(atPrice(100));
    strategy.decide(atPrice(105));
    expect(strategy.decide(atPrice(103))).toEqual({ action: "HOLD" });
    expect(strategy.describe().lastAction).toBe("no trend");
  });
});

describe("CrossoverStrategy", () => {
  it("emits exactly one buy at the cycle where fast crosses above slow", () => {
    const strategy = new CrossoverStrategy({ stepQuote: 50, fast: "sma_5", slow: "sma_20" });
    const series: Array<[number, number]> = [
      [95, 100],
      [97, 100],
      [99, 100],
      [101, 100],
      [103, 100],
      [105, 100]
    ];

    const actions = series.map(([fast, slow], i) => strategy.decide(withIndicators(i + 1, { sma_5: fast, sma_20: slow })).action);

    expect(actions).toEqual(["HOLD", "HOLD", "HOLD", "BUY", "HOLD", "HOLD"]);
  });

  it("sells once when fast drops below slow", () => {
    const strategy = new CrossoverStrategy({ stepQuote: 50, fast: "ema_3", slow: "ema_8" });
    strategy.decide(withIndicators(1, { ema_3: 12, ema_8: 10 }));
    expect(strategy.decide(withIndicators(2, { ema_3: 9, ema_8: 10 }))).toEqual({ action: "SELL", quoteAmount: 50 });
    expect(strategy.decide(withIndicators(3, { ema_3: 8, ema_8: 10 }))).toEqual({ action: "HOLD" });
  });

  it("does not treat the first observed cycle as a cross", () => {
    const strategy = new CrossoverStrategy({ stepQuote: 50, fast: "sma_5", slow: "sma_20" });
    expect(strategy.decide(withIndicators(1, { sma_5: 120, sma_20: 100 }))).toEqual({ action: "HOLD" });
  });

  it("forgets the previous pair while an average is warming up", () => {
    const strategy = new CrossoverStrategy({ stepQuote: 50, fast: "sma_5", slow: "sma_20" });
    strategy.decide(withIndicators(1, { sma_5: 90, sma_20: 100 }));
    strategy.decide(withIndicators(2, { sma_5: 95, sma_20: null }));
    expect(strategy.decide(withIndicators(3, { sma_5: 110, sma_20: 100 }))).toEqual({ action: "HOLD" });
  });
});

describe("ThresholdOscillatorStrategy", () => {
  it("holds on cycles 1-2 and buys the step amount when the oscillator reads 25 on cycle 3", () => {
    const strategy = new ThresholdOscillatorStrategy({ stepQuote: 100, oscillator: "rsi_14", low: 30, high: 70, cooldownCycles: 3 });
    const readings = [50, 40, 25];

    const decisions = readings.map((value, i) =>
      strategy.decide(ctx({ cycle: i + 1, currentPrice: 50_000, indicators: { rsi_14: value } }))
    );

    expect(decisions).toEqual([{ action: "HOLD" }, { action: "HOLD" }, { action: "BUY", quoteAmount: 100 }]);
  });

  it("sells above the high threshold and then cools down", () => {
    const strategy = new ThresholdOscillatorStrategy({ stepQuote: 10, oscillator: "rsi_14", low: 30, high: 70, cooldownCycles: 2 });
    expect(strategy.decide(withIndicators(1, { rsi_14: 80 }))).toEqual({ action: "SELL", quoteAmount: 10 });
    expect(strategy.decide(withIndicators(2, { rsi_14: 85 }))).toEqual({ action: "HOLD" });
    expect(strategy.decide(withIndicators(3, { rsi_14: 85 }))).toEqual({ action: "HOLD" });
    expect(strategy.decide(withIndicators(4, { rsi_14: 85 }))).toEqual({ action: "SELL", quoteAmount: 10 });
  });

  it("holds while the oscillator is absent", () => {
    const strategy = new ThresholdOscillatorStrategy({ stepQuote: 10, oscillator: "rsi_14", low: 30, high: 70, cooldownCycles: 0 });
    expect(strategy.decide(withIndicators(1, { rsi_14: null }))).toEqual({ action: "HOLD" });
    expect(strategy.describe().lastAction).toBe("warming up");
  });
});

describe("strategy catalog", () => {
  it("lists every strategy", () => {
    expect(listStrategies().map((s) => s.id)).toEqual(["trend_follow", "crossover", "threshold_oscillator"]);
  });

  it("defaults the step to 1% of the stoploss", () => {
    const built = buildStrategy("trend_follow", 500);
    expect(built.ok).toBe(true);
    if (!built.ok) return;

    built.strategy.decide(atPrice(1));
    built.strategy.decide(atPrice(2));
    expect(built.strategy.decide(atPrice(3))).toEqual({ action: "BUY", quoteAmount: 5 });
  });

  it("builds crossover with the requested averages", () => {
    const built = buildStrategy("crossover", 100, { fast: "EMA_12", slow: "ema_26" });
    expect(built.ok && built.strategy.indicators).toEqual(["ema_12", "ema_26"]);
  });

  it("rejects invalid params with a readable message", () => {
    const built = buildStrategy("threshold_oscillator", 100, { low: 80, high: 20 });
    expect(built).toEqual({ ok: false, message: "Invalid strategy params: low: low must be below high" });
  });

  it("rejects an rsi in a crossover", () => {
    const built = buildStrategy("crossover", 100, { fast: "rsi_14" });
    expect(built.ok).toBe(false);
  });
});
