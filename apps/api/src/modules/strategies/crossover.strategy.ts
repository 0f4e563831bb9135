import type { Decision, StrategyDiagnostics } from "@paperbot/shared";
import { z } from "zod";

import { parseIndicatorId } from "../indicators/indicator-snapshot";
import { type BotContext, buy, HOLD, sell, type TradingStrategy } from "./strategy";

export const CrossoverParamsSchema = z
  .object({
    stepQuote: z.number().positive().finite(),
    fast: z.string().default("sma_5"),
    slow: z.string().default("sma_20")
  })
  .transform((value, ctx) => {
    try {
      const fast = parseIndicatorId(value.fast);
      const slow = parseIndicatorId(value.slow);
      if (fast.kind === "rsi" || slow.kind === "rsi") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Crossover needs moving averages (sma_N or ema_N)" });
        return z.NEVER;
      }
      if (fast.id === slow.id) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "fast and slow must be different indicators", path: ["slow"] });
        return z.NEVER;
      }
      return { stepQuote: value.stepQuote, fast: fast.id, slow: slow.id };
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      return z.NEVER;
    }
  });
export type CrossoverParams = z.infer<typeof CrossoverParamsSchema>;

type AveragePair = { fast: number; slow: number };

/**
 * Moving-average crossover. The edge is detected against the pair remembered from the
 * previous cycle, so a cross produces one signal and staying on one side produces none.
 */
export class CrossoverStrategy implements TradingStrategy {
  readonly id = "crossover" as const;
  readonly name = "MA Crossover";
  readonly indicators: readonly string[];

  private previous: AveragePair | null = null;
  private buys = 0;
  private sells = 0;
  private lastAction = "initialized";

  constructor(private readonly params: CrossoverParams) {
    this.indicators = [params.fast, params.slow];
  }

  decide(ctx: BotContext): Decision {
    const fast = ctx.indicators[this.params.fast] ?? null;
    const slow = ctx.indicators[this.params.slow] ?? null;
    if (fast === null || slow === null) {
      this.previous = null;
      this.lastAction = "warming up";
      return HOLD;
    }

    const previous = this.previous;
    this.previous = { fast, slow };
    if (!previous) {
      this.lastAction = "tracking";
      return HOLD;
    }

    if (previous.fast <= previous.slow && fast > slow) {
      this.buys += 1;
      this.lastAction = `golden cross, buy ${this.params.stepQuote.toFixed(2)}`;
      return buy(this.params.stepQuote);
    }

    if (previous.fast >= previous.slow && fast < slow) {
      this.sells += 1;
      this.lastAction = `death cross, sell ${this.params.stepQuote.toFixed(2)}`;
      return sell(this.params.stepQuote);
    }

    this.lastAction = fast > slow ? "fast above slow" : fast < slow ? "fast below slow" : "averages level";
    return HOLD;
  }

  describe(): StrategyDiagnostics {
    return {
      lastAction: this.lastAction,
      buys: this.buys,
      sells: this.sells,
      details: { fast: this.params.fast, slow: this.params.slow, previous: this.previous }
    };
  }
}
