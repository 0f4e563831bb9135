import type { Decision, StrategyDiagnostics } from "@paperbot/shared";
import { z } from "zod";

import { parseIndicatorId } from "../indicators/indicator-snapshot";
import { type BotContext, buy, HOLD, sell, type TradingStrategy } from "./strategy";

export const ThresholdOscillatorParamsSchema = z
  .object({
    stepQuote: z.number().positive().finite(),
    oscillator: z.string().default("rsi_14"),
    low: z.number().min(0).max(100).default(30),
    high: z.number().min(0).max(100).default(70),
    cooldownCycles: z.number().int().min(0).max(1_000).default(3)
  })
  .superRefine((value, ctx) => {
    if (value.low >= value.high) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "low must be below high", path: ["low"] });
    }
  })
  .transform((value, ctx) => {
    try {
      return { ...value, oscillator: parseIndicatorId(value.oscillator).id };
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err), path: ["oscillator"] });
      return z.NEVER;
    }
  });
export type ThresholdOscillatorParams = z.infer<typeof ThresholdOscillatorParamsSchema>;

/** Buys oversold readings (< low), sells overbought ones (> high), then cools down. */
export class ThresholdOscillatorStrategy implements TradingStrategy {
  readonly id = "threshold_oscillator" as const;
  readonly name = "Threshold Oscillator";
  readonly indicators: readonly string[];

  private cooldownRemaining = 0;
  private lastValue: number | null = null;
  private buys = 0;
  private sells = 0;
  private lastAction = "initialized";

  constructor(private readonly params: ThresholdOscillatorParams) {
    this.indicators = [params.oscillator];
  }

  decide(ctx: BotContext): Decision {
    const value = ctx.indicators[this.params.oscillator] ?? null;
    this.lastValue = value;

    if (this.cooldownRemaining > 0) {
      this.cooldownRemaining -= 1;
      this.lastAction = `cooldown (${this.cooldownRemaining})`;
      return HOLD;
    }

    if (value === null) {
      this.lastAction = "warming up";
      return HOLD;
    }

    if (value < this.params.low) {
      this.cooldownRemaining = this.params.cooldownCycles;
      this.buys += 1;
      this.lastAction = `oversold ${value.toFixed(1)}, buy ${this.params.stepQuote.toFixed(2)}`;
      return buy(this.params.stepQuote);
    }

    if (value > this.params.high) {
      this.cooldownRemaining = this.params.cooldownCycles;
      this.sells += 1;
      this.lastAction = `overbought ${value.toFixed(1)}, sell ${this.params.stepQuote.toFixed(2)}`;
      return sell(this.params.stepQuote);
    }

    this.lastAction = `neutral ${value.toFixed(1)}`;
    return HOLD;
  }

  describe(): StrategyDiagnostics {
    return {
      lastAction: this.lastAction,
      buys: this.buys,
      sells: this.sells,
      details: {
        oscillator: this.params.oscillator,
        lastValue: this.lastValue,
        cooldownRemaining: this.cooldownRemaining
      }
    };
  }
}
