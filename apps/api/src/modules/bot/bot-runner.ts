import crypto from "node:crypto";

import type { BotPhase, BotStatus, BotSummary, Decision, TerminalBotPhase } from "@paperbot/shared";

import type { IndicatorService } from "../indicators/indicator-snapshot";
import type { AppLogger } from "../logging/pino-logger";
import type { PriceStoreService } from "../market/price-store.service";
import type { PortfolioService } from "../portfolio/portfolio.service";
import type { BotContext, TradingStrategy } from "../strategies/strategy";

export type BotRunnerDeps = {
  portfolio: PortfolioService;
  prices: PriceStoreService;
  indicators: IndicatorService;
  logger: AppLogger;
};

export type BotRunnerOptions = {
  userId: string;
  strategy: TradingStrategy;
  baseAsset: string;
  quoteAsset: string;
  stoploss: number;
  initialValueUsd: number;
  cycleIntervalMs: number;
  contextWindowSize: number;
  onTerminal?: (runner: BotRunner) => void;
};

export type CycleOutcome = "SKIPPED" | "HOLD" | "TRADED" | "TERMINATED" | "CANCELLED";

type TerminalRecord = {
  phase: TerminalBotPhase;
  reason: string;
  endedAt: string;
  lastError?: string;
};

/**
 * One bot bound to one user. Cycles run strictly one after another: the next timer
 * is armed only when the previous cycle has finished. Each cycle holds the user's
 * ledger turn from the moment it reads balances until the trade is applied.
 */
export class BotRunner {
  readonly id = crypto.randomUUID();
  readonly userId: string;
  readonly startedAt = new Date().toISOString();

  private readonly abort = new AbortController();
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private terminal: TerminalRecord | null = null;
  private cycleCount = 0;
  private lastCycleAt?: string;
  private lastDecision?: Decision;

  constructor(
    private readonly deps: BotRunnerDeps,
    private readonly options: BotRunnerOptions
  ) {
    this.userId = options.userId;
  }

  get phase(): BotPhase {
    if (this.terminal) return this.terminal.phase;
    return this.started ? "RUNNING" : "STARTING";
  }

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  start(): void {
    if (this.started || this.terminal) return;
    this.started = true;
    this.deps.logger.info({
      msg: "Bot started",
      botId: this.id,
      userId: this.userId,
      strategy: this.options.strategy.id,
      pair: `${this.options.baseAsset}/${this.options.quoteAsset}`,
      stoploss: this.options.stoploss,
      initialValueUsd: this.options.initialValueUsd
    });
    this.schedule(0);
  }

  /** Cooperative stop. Returns the final status; calling it again changes nothing. */
  stop(reason = "Stopped on request"): BotStatus {
    this.finish("STOPPED", reason);
    return this.status();
  }

  /**
   * Runs one cycle now. Waits for the user's ledger turn, then re-checks cancellation
   * before reading anything, so a stopped runner never touches the ledger again.
   */
  async runCycle(): Promise<CycleOutcome> {
    if (this.abort.signal.aborted) return "CANCELLED";
    try {
      return await this.deps.portfolio.runExclusive(this.userId, () => this.cycle());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.deps.logger.error({ msg: "Bot cycle failed", botId: this.id, userId: this.userId, error: message });
      this.finish("ERRORED", "Cycle failed with an unexpected error", message);
      return "TERMINATED";
    }
  }

  status(): BotStatus {
    const summary = this.summary();
    if (this.terminal) {
      return { state: this.terminal.phase, reason: this.terminal.reason, endedAt: this.terminal.endedAt, lastError: this.terminal.lastError, ...summary };
    }
    return { state: this.started ? "RUNNING" : "STARTING", ...summary };
  }

  summary(): BotSummary {
    const { strategy } = this.options;
    return {
      strategyId: strategy.id,
      strategyName: strategy.name,
      baseAsset: this.options.baseAsset,
      quoteAsset: this.options.quoteAsset,
      stoploss: this.options.stoploss,
      initialValueUsd: this.options.initialValueUsd,
      cycleCount: this.cycleCount,
      startedAt: this.startedAt,
      lastCycleAt: this.lastCycleAt,
      lastDecision: this.lastDecision,
      diagnostics: strategy.describe()
    };
  }

  private schedule(delayMs: number): void {
    if (this.abort.signal.aborted) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  // runCycle never rejects, so the timer callback can fire and forget.
  private async tick(): Promise<void> {
    await this.runCycle();
    this.schedule(this.options.cycleIntervalMs);
  }

  private cycle(): CycleOutcome {
    if (this.abort.signal.aborted) return "CANCELLED";

    const { portfolio, prices, indicators, logger } = this.deps;
    const { strategy, baseAsset, quoteAsset } = this.options;

    const window = prices.window(baseAsset, this.options.contextWindowSize);
    const currentPrice = prices.pairPrice(baseAsset, quoteAsset);
    if (window.length === 0 || currentPrice === null) {
      logger.warn({ msg: "No price data, cycle skipped", botId: this.id, userId: this.userId, pair: `${baseAsset}/${quoteAsset}` });
      return "SKIPPED";
    }

    this.cycleCount += 1;
    this.lastCycleAt = new Date().toISOString();

    const ctx: BotContext = Object.freeze({
      priceWindow: Object.freeze(window),
      baseBalance: portfolio.getBalance(this.userId, baseAsset),
      quoteBalance: portfolio.getBalance(this.userId, quoteAsset),
      currentPrice,
      baseAsset,
      quoteAsset,
      cycle: this.cycleCount,
      indicators: indicators.compute(
        window.map((p) => p.price),
        strategy.indicators
      )
    });

    const decision = strategy.decide(ctx);
    this.lastDecision = decision;

    const valuation = portfolio.valueUsd(this.userId);
    if (!valuation) {
      throw new Error(`Account ${this.userId} disappeared while the bot was running`);
    }
    const loss = this.options.initialValueUsd - valuation.totalUsd;
    if (loss >= this.options.stoploss) {
      this.finish(
        "STOPLOSS_TRIGGERED",
        `Account value ${valuation.totalUsd.toFixed(2)} is ${loss.toFixed(2)} below the starting ${this.options.initialValueUsd.toFixed(2)} (stoploss ${this.options.stoploss})`
      );
      return "TERMINATED";
    }

    logger.debug({ msg: "Bot decision", botId: this.id, userId: this.userId, cycle: this.cycleCount, decision });
    if (decision.action === "HOLD") return "HOLD";

    const result = portfolio.applyDecision({
      userId: this.userId,
      decision,
      baseAsset,
      quoteAsset,
      price: currentPrice,
      botName: strategy.name
    });
    if (result.ok) return "TRADED";

    switch (result.reason) {
      case "INSUFFICIENT_FUNDS":
      case "INSUFFICIENT_ASSETS":
        this.finish("INSUFFICIENT_FUNDS", result.message);
        break;
      default:
        this.finish("REJECTED", `${result.reason}: ${result.message}`);
    }
    return "TERMINATED";
  }

  private finish(phase: TerminalBotPhase, reason: string, lastError?: string): void {
    if (this.terminal) return;
    this.terminal = { phase, reason, endedAt: new Date().toISOString(), lastError };
    this.abort.abort();
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;

    const entry = { msg: "Bot finished", botId: this.id, userId: this.userId, phase, reason, cycles: this.cycleCount };
    if (phase === "STOPPED") this.deps.logger.info(entry);
    else this.deps.logger.warn(entry);
    this.options.onTerminal?.(this);
  }
}
