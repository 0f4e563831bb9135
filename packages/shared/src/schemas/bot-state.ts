import { z } from "zod";

import { UserIdSchema } from "./ledger";
import { AssetSchema } from "./market";

export const StrategyIdSchema = z.enum(["trend_follow", "crossover", "threshold_oscillator"]);
export type StrategyId = z.infer<typeof StrategyIdSchema>;

export const BotPhaseSchema = z.enum([
  "STARTING",
  "RUNNING",
  "STOPPED",
  "STOPLOSS_TRIGGERED",
  "INSUFFICIENT_FUNDS",
  "REJECTED",
  "ERRORED"
]);
export type BotPhase = z.infer<typeof BotPhaseSchema>;

export type TerminalBotPhase = Exclude<BotPhase, "STARTING" | "RUNNING">;

export function isTerminalPhase(phase: BotPhase): phase is TerminalBotPhase {
  return phase !== "STARTING" && phase !== "RUNNING";
}

export const DecisionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("HOLD") }),
  z.object({ action: z.literal("BUY"), quoteAmount: z.number() }),
  z.object({ action: z.literal("SELL"), quoteAmount: z.number() })
]);
export type Decision = z.infer<typeof DecisionSchema>;

export const StartBotRequestSchema = z.object({
  userId: UserIdSchema,
  strategy: StrategyIdSchema,
  baseAsset: AssetSchema,
  quoteAsset: AssetSchema,
  stoploss: z.number().positive().finite(),
  params: z.record(z.unknown()).optional()
});
export type StartBotRequest = z.infer<typeof StartBotRequestSchema>;

export const StopBotRequestSchema = z.object({
  userId: UserIdSchema
});
export type StopBotRequest = z.infer<typeof StopBotRequestSchema>;

export type StrategyDiagnostics = {
  lastAction: string;
  buys: number;
  sells: number;
  details?: Record<string, unknown>;
};

export type BotSummary = {
  strategyId: StrategyId;
  strategyName: string;
  baseAsset: string;
  quoteAsset: string;
  stoploss: number;
  initialValueUsd: number;
  cycleCount: number;
  startedAt: string;
  lastCycleAt?: string;
  lastDecision?: Decision;
  diagnostics: StrategyDiagnostics;
};

export type BotStatus =
  | { state: "NOT_RUNNING" }
  | ({ state: "STARTING" | "RUNNING" } & BotSummary)
  | ({ state: TerminalBotPhase; reason: string; endedAt: string; lastError?: string } & BotSummary);
