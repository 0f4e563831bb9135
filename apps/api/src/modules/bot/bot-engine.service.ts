import { Inject, Injectable, type OnModuleDestroy } from "@nestjs/common";
import type { BotStatus, StartBotRequest } from "@paperbot/shared";

import { ConfigService } from "../config/config.service";
import { IndicatorService } from "../indicators/indicator-snapshot";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { PriceStoreService } from "../market/price-store.service";
import { PortfolioService } from "../portfolio/portfolio.service";
import { buildStrategy, listStrategies, type StrategyInfo } from "../strategies/strategy-catalog";
import { ActiveBotRegistry } from "./active-bot-registry";
import { BotRunner } from "./bot-runner";

export type StartRejection =
  | "USER_NOT_FOUND"
  | "ALREADY_RUNNING"
  | "INVALID_PAIR"
  | "INVALID_PARAMS"
  | "UNPRICED_HOLDINGS"
  | "ACCOUNT_LOCKED";

export type StartBotResult = { ok: true; status: BotStatus } | { ok: false; reason: StartRejection; message: string };

@Injectable()
export class BotEngineService implements OnModuleDestroy {
  private readonly registry = new ActiveBotRegistry();

  constructor(
    private readonly configService: ConfigService,
    private readonly portfolio: PortfolioService,
    private readonly prices: PriceStoreService,
    private readonly indicators: IndicatorService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {}

  onModuleDestroy(): void {
    for (const runner of this.registry.runners()) {
      runner.stop("Service shutting down");
    }
  }

  listStrategies(): StrategyInfo[] {
    return listStrategies();
  }

  /**
   * Validates the request, captures the account value as the stoploss reference and
   * registers the runner. Everything up to registration is synchronous, so a second
   * start for the same user sees the first one.
   */
  start(request: StartBotRequest): StartBotResult {
    const { userId, baseAsset, quoteAsset } = request;
    if (!this.portfolio.hasAccount(userId)) {
      return { ok: false, reason: "USER_NOT_FOUND", message: `Unknown user ${userId}` };
    }
    if (this.registry.isActive(userId)) {
      return { ok: false, reason: "ALREADY_RUNNING", message: `A bot is already running for ${userId}` };
    }

    const config = this.configService.load();
    if (baseAsset === quoteAsset || baseAsset === config.homeAsset) {
      return { ok: false, reason: "INVALID_PAIR", message: `Cannot trade ${baseAsset}/${quoteAsset}` };
    }

    const built = buildStrategy(request.strategy, request.stoploss, request.params);
    if (!built.ok) {
      return { ok: false, reason: "INVALID_PARAMS", message: built.message };
    }

    const valuation = this.portfolio.valueUsd(userId);
    if (!valuation) {
      return { ok: false, reason: "USER_NOT_FOUND", message: `Unknown user ${userId}` };
    }
    // The stoploss reference must cover the whole account.
    if (valuation.unpriced.length > 0) {
      return {
        ok: false,
        reason: "UNPRICED_HOLDINGS",
        message: `Cannot value the account: no price for ${valuation.unpriced.join(", ")}`
      };
    }

    const runner = new BotRunner(
      { portfolio: this.portfolio, prices: this.prices, indicators: this.indicators, logger: this.logger },
      {
        userId,
        strategy: built.strategy,
        baseAsset,
        quoteAsset,
        stoploss: request.stoploss,
        initialValueUsd: valuation.totalUsd,
        cycleIntervalMs: config.cycleIntervalMs,
        contextWindowSize: config.contextWindowSize,
        onTerminal: (finished) => this.onRunnerFinished(finished)
      }
    );

    if (!this.portfolio.acquireTradingLock(userId, runner.id)) {
      return { ok: false, reason: "ACCOUNT_LOCKED", message: `Account ${userId} is locked by another trader` };
    }
    const registered = this.registry.tryStart(userId, runner);
    if (!registered.ok) {
      this.portfolio.releaseTradingLock(userId, runner.id);
      return { ok: false, reason: registered.reason, message: `A bot is already running for ${userId}` };
    }

    runner.start();
    return { ok: true, status: runner.status() };
  }

  /** Idempotent: stopping a finished bot returns its terminal status unchanged. */
  stop(userId: string): BotStatus {
    return this.registry.stop(userId);
  }

  status(userId: string): BotStatus {
    return this.registry.status(userId);
  }

  runner(userId: string): BotRunner | null {
    return this.registry.get(userId);
  }

  private onRunnerFinished(runner: BotRunner): void {
    this.registry.release(runner);
    this.portfolio.releaseTradingLock(runner.userId, runner.id);
  }
}
