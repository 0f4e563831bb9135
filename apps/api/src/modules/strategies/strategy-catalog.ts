import type { StrategyId } from "@paperbot/shared";
import { StrategyIdSchema } from "@paperbot/shared";
import type { z, ZodTypeAny } from "zod";

import { CrossoverParamsSchema, CrossoverStrategy } from "./crossover.strategy";
import type { TradingStrategy } from "./strategy";
import { ThresholdOscillatorParamsSchema, ThresholdOscillatorStrategy } from "./threshold-oscillator.strategy";
import { TrendFollowParamsSchema, TrendFollowStrategy } from "./trend-follow.strategy";

// Default trade size when the caller does not pass stepQuote.
export const DEFAULT_STEP_FRACTION_OF_STOPLOSS = 0.01;

export type StrategyInfo = {
  id: StrategyId;
  name: string;
  description: string;
};

export type BuildStrategyResult = { ok: true; strategy: TradingStrategy } | { ok: false; message: string };

type StrategyFactory = (params: unknown) => BuildStrategyResult;

function factory<S extends ZodTypeAny>(schema: S, build: (params: z.output<S>) => TradingStrategy): StrategyFactory {
  return (params) => {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return { ok: false, message: `Invalid strategy params: ${where}${issue?.message ?? "unknown error"}` };
    }
    return { ok: true, strategy: build(parsed.data) };
  };
}

const CATALOG: Record<StrategyId, StrategyInfo & { create: StrategyFactory }> = {
  trend_follow: {
    id: "trend_follow",
    name: "Trend Follow",
    description: "Buys after consecutive rising cycle prices, sells after consecutive falling ones, then cools down.",
    create: factory(TrendFollowParamsSchema, (params) => new TrendFollowStrategy(params))
  },
  crossover: {
    id: "crossover",
    name: "MA Crossover",
    description: "Buys when the fast moving average crosses above the slow one, sells on the opposite cross.",
    create: factory(CrossoverParamsSchema, (params) => new CrossoverStrategy(params))
  },
  threshold_oscillator: {
    id: "threshold_oscillator",
    name: "Threshold Oscillator",
    description: "Buys when the oscillator reads oversold, sells when it reads overbought, with a cooldown.",
    create: factory(ThresholdOscillatorParamsSchema, (params) => new ThresholdOscillatorStrategy(params))
  }
};

export function listStrategies(): StrategyInfo[] {
  return StrategyIdSchema.options.map((id) => {
    const { name, description } = CATALOG[id];
    return { id, name, description };
  });
}

/** Fresh instance with its own private state; never shared between bots. */
export function buildStrategy(id: StrategyId, stoploss: number, params: Record<string, unknown> = {}): BuildStrategyResult {
  return CATALOG[id].create({ stepQuote: stoploss * DEFAULT_STEP_FRACTION_OF_STOPLOSS, ...params });
}
