import crypto from "node:crypto";

import { Inject, Injectable, type OnModuleInit } from "@nestjs/common";
import type { Account, AccountStats, Decision, LedgerRejection, ManualTradeRequest, Transaction, TradeSide } from "@paperbot/shared";

import { ConfigService } from "../config/config.service";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { PriceStoreService } from "../market/price-store.service";
import { KeyedMutex } from "./keyed-mutex";
import { LEDGER_REPOSITORY, type LedgerRepository } from "./ledger.repository";

export type LedgerResult = { ok: true; transaction: Transaction } | { ok: false; reason: LedgerRejection; message: string };

export type OpenAccountResult = { ok: true; account: Account } | { ok: false; reason: LedgerRejection; message: string };

export type WalletAsset = {
  asset: string;
  total: number;
  estPriceHome?: number;
  estValueHome?: number;
};

export type WalletSnapshot = {
  fetchedAt: string;
  userId: string;
  homeAsset: string;
  totalEstimatedHome: number;
  assets: WalletAsset[];
  errors: string[];
};

export type Valuation = {
  totalUsd: number;
  unpriced: string[];
};

export type ApplyDecisionParams = {
  userId: string;
  decision: Exclude<Decision, { action: "HOLD" }>;
  baseAsset: string;
  quoteAsset: string;
  price: number;
  botName: string;
};

type AccountState = {
  userId: string;
  balances: Map<string, number>;
  transactions: Transaction[];
};

type TradeDraft = {
  userId: string;
  baseAsset: string;
  quoteAsset: string;
  side: TradeSide;
  quantity: number;
  price: number;
  notional: number;
  botName?: string;
};

function reject(reason: LedgerRejection, message: string): LedgerResult {
  return { ok: false, reason, message };
}

function isPositiveAmount(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Per-user balances plus the append-only transaction log. Every balance change and
 * its transaction are written in one synchronous block, so no reader can observe
 * one without the other. Multi-step operations for a user go through `runExclusive`.
 * While a bot holds the trading lock, manual trades and cash movements are refused.
 */
@Injectable()
export class PortfolioService implements OnModuleInit {
  private readonly accounts = new Map<string, AccountState>();
  private readonly mutex = new KeyedMutex();
  private readonly tradingLocks = new Map<string, string>();
  readonly homeAsset: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly prices: PriceStoreService,
    @Inject(LEDGER_REPOSITORY) private readonly repository: LedgerRepository,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {
    this.homeAsset = configService.load().homeAsset;
  }

  onModuleInit(): void {
    this.seed();
  }

  seed(): number {
    const seeded = this.repository.load();
    for (const account of seeded) {
      this.accounts.set(account.userId, {
        userId: account.userId,
        balances: new Map(Object.entries(account.balances)),
        transactions: account.transactions.map((t) => ({ ...t }))
      });
    }
    this.logger.info({ msg: "Ledger seeded", accounts: seeded.length });
    return seeded.length;
  }

  runExclusive<T>(userId: string, fn: () => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(userId, fn);
  }

  // ─── Trading lock held by a running bot ───

  acquireTradingLock(userId: string, holder: string): boolean {
    const current = this.tradingLocks.get(userId);
    if (current !== undefined && current !== holder) return false;
    this.tradingLocks.set(userId, holder);
    return true;
  }

  releaseTradingLock(userId: string, holder: string): void {
    if (this.tradingLocks.get(userId) === holder) {
      this.tradingLocks.delete(userId);
    }
  }

  tradingLockHolder(userId: string): string | null {
    return this.tradingLocks.get(userId) ?? null;
  }

  // ─── Reads ───

  hasAccount(userId: string): boolean {
    return this.accounts.has(userId);
  }

  getAccount(userId: string): Account | null {
    const state = this.accounts.get(userId);
    return state ? this.toAccount(state) : null;
  }

  getBalance(userId: string, asset: string): number {
    return this.accounts.get(userId)?.balances.get(asset.toUpperCase()) ?? 0;
  }

  getTransactions(userId: string, limit?: number): Transaction[] | null {
    const state = this.accounts.get(userId);
    if (!state) return null;
    const list = limit === undefined ? state.transactions : state.transactions.slice(-limit);
    return list.map((t) => ({ ...t }));
  }

  /** Whole-account value in the home asset; assets without a price are listed and skipped. */
  valueUsd(userId: string): Valuation | null {
    const state = this.accounts.get(userId);
    if (!state) return null;

    let totalUsd = 0;
    const unpriced: string[] = [];
    for (const [asset, balance] of state.balances) {
      if (balance <= 0) continue;
      const price = this.prices.usdPrice(asset);
      if (price === null) {
        unpriced.push(asset);
        continue;
      }
      totalUsd += balance * price;
    }

    if (unpriced.length > 0) {
      this.logger.warn({ msg: "Assets without a price left out of valuation", userId, unpriced });
    }
    return { totalUsd, unpriced };
  }

  getWallet(userId: string): WalletSnapshot | null {
    const state = this.accounts.get(userId);
    if (!state) return null;

    const homeAsset = this.homeAsset;
    const errors: string[] = [];
    let totalEstimatedHome = 0;
    const assets: WalletAsset[] = Array.from(state.balances.entries())
      .filter(([, total]) => total > 0)
      .map(([asset, total]): WalletAsset => {
        const price = this.prices.usdPrice(asset);
        if (price === null) {
          errors.push(`No price for ${asset}`);
          return { asset, total };
        }
        const estValueHome = total * price;
        totalEstimatedHome += estValueHome;
        return { asset, total, estPriceHome: price, estValueHome };
      })
      .sort((a, b) => {
        const av = a.estValueHome ?? 0;
        const bv = b.estValueHome ?? 0;
        if (av !== bv) return bv - av;
        return b.total - a.total;
      });

    return { fetchedAt: new Date().toISOString(), userId, homeAsset, totalEstimatedHome, assets, errors };
  }

  /** Lifetime statistics, always recomputed from the transaction log. */
  getStats(userId: string): AccountStats | null {
    const state = this.accounts.get(userId);
    if (!state) return null;

    const stats: AccountStats = {
      userId,
      transactions: state.transactions.length,
      trades: 0,
      buys: 0,
      sells: 0,
      botTrades: 0,
      deposits: 0,
      withdrawals: 0,
      depositedTotal: 0,
      withdrawnTotal: 0,
      buyNotionalUsd: 0,
      sellNotionalUsd: 0,
      firstActivityAt: state.transactions[0]?.ts,
      lastActivityAt: state.transactions[state.transactions.length - 1]?.ts
    };

    for (const t of state.transactions) {
      switch (t.kind) {
        case "DEPOSIT":
          stats.deposits += 1;
          stats.depositedTotal += t.notional;
          break;
        case "WITHDRAWAL":
          stats.withdrawals += 1;
          stats.withdrawnTotal += t.notional;
          break;
        case "TRADE": {
          stats.trades += 1;
          if (t.botName) stats.botTrades += 1;
          const usd = t.notional * (t.quoteUsdPrice ?? 0);
          if (t.side === "BUY") {
            stats.buys += 1;
            stats.buyNotionalUsd += usd;
          } else {
            stats.sells += 1;
            stats.sellNotionalUsd += usd;
          }
          break;
        }
      }
    }
    return stats;
  }

  // ─── Mutations ───

  openAccount(userId: string): OpenAccountResult {
    if (this.accounts.has(userId)) {
      return { ok: false, reason: "ACCOUNT_EXISTS", message: `Account ${userId} already exists` };
    }
    const state: AccountState = { userId, balances: new Map(), transactions: [] };
    this.accounts.set(userId, state);
    this.persist();
    this.logger.info({ msg: "Account opened", userId });
    return { ok: true, account: this.toAccount(state) };
  }

  /**
   * Converts a bot decision into a trade at `price` and applies it. Synchronous; the
   * caller already holds the user's turn through `runExclusive`.
   */
  applyDecision(params: ApplyDecisionParams): LedgerResult {
    const { decision, price } = params;
    if (!isPositiveAmount(decision.quoteAmount)) {
      return reject("INVALID_AMOUNT", `Decision amount must be positive, got ${decision.quoteAmount}`);
    }
    if (!isPositiveAmount(price)) {
      return reject("PRICE_UNAVAILABLE", `No usable price for ${params.baseAsset}/${params.quoteAsset}`);
    }

    const quantity = decision.quoteAmount / price;
    if (!isPositiveAmount(quantity)) {
      return reject("INVALID_AMOUNT", `Amount ${decision.quoteAmount} is too small to trade at ${price}`);
    }

    return this.applyTrade({
      userId: params.userId,
      baseAsset: params.baseAsset.toUpperCase(),
      quoteAsset: params.quoteAsset.toUpperCase(),
      side: decision.action,
      quantity,
      price,
      notional: decision.quoteAmount,
      botName: params.botName
    });
  }

  /** Manual trade of `quantity` base units at the current pair price. */
  async executeTrade(userId: string, request: ManualTradeRequest): Promise<LedgerResult> {
    return await this.runExclusive(userId, () => {
      const locked = this.checkManualAccess(userId);
      if (locked) return locked;

      if (!isPositiveAmount(request.quantity)) {
        return reject("INVALID_AMOUNT", `Quantity must be positive, got ${request.quantity}`);
      }
      const price = this.prices.pairPrice(request.baseAsset, request.quoteAsset);
      if (price === null) {
        return reject("PRICE_UNAVAILABLE", `No price for ${request.baseAsset}/${request.quoteAsset}`);
      }

      return this.applyTrade({
        userId,
        baseAsset: request.baseAsset.toUpperCase(),
        quoteAsset: request.quoteAsset.toUpperCase(),
        side: request.side,
        quantity: request.quantity,
        price,
        notional: price * request.quantity
      });
    });
  }

  async deposit(userId: string, amount: number): Promise<LedgerResult> {
    return await this.runExclusive(userId, () => {
      const locked = this.checkManualAccess(userId);
      if (locked) return locked;
      const state = this.accounts.get(userId);
      if (!state) return reject("USER_NOT_FOUND", `Unknown user ${userId}`);

      const { depositMin, depositMax } = this.configService.load().ledger;
      if (!Number.isFinite(amount)) return reject("INVALID_AMOUNT", "Deposit amount must be a number");
      if (amount < depositMin) return reject("DEPOSIT_TOO_SMALL", `Minimum deposit is ${depositMin}`);
      if (amount > depositMax) return reject("DEPOSIT_TOO_LARGE", `Maximum deposit is ${depositMax}`);

      return this.applyCashMovement(state, "DEPOSIT", amount);
    });
  }

  async withdraw(userId: string, amount: number): Promise<LedgerResult> {
    return await this.runExclusive(userId, () => {
      const locked = this.checkManualAccess(userId);
      if (locked) return locked;
      const state = this.accounts.get(userId);
      if (!state) return reject("USER_NOT_FOUND", `Unknown user ${userId}`);

      if (!isPositiveAmount(amount)) return reject("INVALID_AMOUNT", "Withdrawal amount must be positive");
      const available = state.balances.get(this.homeAsset) ?? 0;
      if (amount > available) {
        return reject("WITHDRAWAL_EXCEEDS_BALANCE", `Cannot withdraw ${amount}, only ${available} available`);
      }

      return this.applyCashMovement(state, "WITHDRAWAL", amount);
    });
  }

  // ─── Internals ───

  private checkManualAccess(userId: string): LedgerResult | null {
    if (!this.accounts.has(userId)) return reject("USER_NOT_FOUND", `Unknown user ${userId}`);
    const holder = this.tradingLocks.get(userId);
    if (holder !== undefined) {
      return reject("ACCOUNT_LOCKED", `Account is being traded by ${holder}; stop the bot first`);
    }
    return null;
  }

  private applyTrade(draft: TradeDraft): LedgerResult {
    const state = this.accounts.get(draft.userId);
    if (!state) return reject("USER_NOT_FOUND", `Unknown user ${draft.userId}`);

    const baseBalance = state.balances.get(draft.baseAsset) ?? 0;
    const quoteBalance = state.balances.get(draft.quoteAsset) ?? 0;

    if (draft.side === "BUY" && quoteBalance < draft.notional) {
      return reject(
        "INSUFFICIENT_FUNDS",
        `Cannot buy: need ${draft.notional.toFixed(2)} ${draft.quoteAsset} but only have ${quoteBalance.toFixed(2)}`
      );
    }
    if (draft.side === "SELL" && baseBalance < draft.quantity) {
      return reject(
        "INSUFFICIENT_ASSETS",
        `Cannot sell ${draft.quantity.toFixed(8)} ${draft.baseAsset}: only ${baseBalance.toFixed(8)} held`
      );
    }

    const transaction: Transaction = {
      id: crypto.randomUUID(),
      userId: draft.userId,
      kind: "TRADE",
      baseAsset: draft.baseAsset,
      quoteAsset: draft.quoteAsset,
      side: draft.side,
      quantity: draft.quantity,
      price: draft.price,
      notional: draft.notional,
      ts: new Date().toISOString(),
      baseUsdPrice: this.prices.usdPrice(draft.baseAsset) ?? undefined,
      quoteUsdPrice: this.prices.usdPrice(draft.quoteAsset) ?? undefined,
      botName: draft.botName
    };

    if (draft.side === "BUY") {
      state.balances.set(draft.quoteAsset, quoteBalance - draft.notional);
      state.balances.set(draft.baseAsset, baseBalance + draft.quantity);
    } else {
      state.balances.set(draft.baseAsset, baseBalance - draft.quantity);
      state.balances.set(draft.quoteAsset, quoteBalance + draft.notional);
    }
    state.transactions.push(transaction);

    this.persist();
    this.logger.info({
      msg: "Trade applied",
      userId: draft.userId,
      side: draft.side,
      pair: `${draft.baseAsset}/${draft.quoteAsset}`,
      quantity: draft.quantity,
      price: draft.price,
      botName: draft.botName
    });
    return { ok: true, transaction: { ...transaction } };
  }

  private applyCashMovement(state: AccountState, kind: "DEPOSIT" | "WITHDRAWAL", amount: number): LedgerResult {
    const asset = this.homeAsset;
    const balance = state.balances.get(asset) ?? 0;
    const transaction: Transaction = {
      id: crypto.randomUUID(),
      userId: state.userId,
      kind,
      baseAsset: asset,
      quoteAsset: asset,
      quantity: amount,
      price: 1,
      notional: amount,
      ts: new Date().toISOString(),
      baseUsdPrice: 1,
      quoteUsdPrice: 1
    };

    state.balances.set(asset, kind === "DEPOSIT" ? balance + amount : balance - amount);
    state.transactions.push(transaction);

    this.persist();
    this.logger.info({ msg: kind === "DEPOSIT" ? "Deposit applied" : "Withdrawal applied", userId: state.userId, amount });
    return { ok: true, transaction: { ...transaction } };
  }

  private toAccount(state: AccountState): Account {
    return {
      userId: state.userId,
      balances: Object.fromEntries(state.balances),
      transactions: state.transactions.map((t) => ({ ...t }))
    };
  }

  private persist(): void {
    try {
      this.repository.save(Array.from(this.accounts.values(), (s) => this.toAccount(s)));
    } catch (err) {
      // The in-memory ledger stays authoritative; the next mutation retries the write.
      this.logger.error({ msg: "Failed to persist ledger", error: err instanceof Error ? err.message : String(err) });
    }
  }
}
