import { Body, Controller, Get, NotFoundException, Param, Post, Query } from "@nestjs/common";
import type { Account, AccountStats, Transaction } from "@paperbot/shared";
import { AmountRequestSchema, ManualTradeRequestSchema, UserIdSchema } from "@paperbot/shared";
import { z } from "zod";

import { parseOrBadRequest, rejectionToHttp } from "../http/request-validation";
import type { LedgerResult, Valuation, WalletSnapshot } from "./portfolio.service";
import { PortfolioService } from "./portfolio.service";

const LimitQuerySchema = z.coerce.number().int().min(1).max(10_000).optional();

type PortfolioView = Account & { valuation: Valuation; wallet: WalletSnapshot };

@Controller("portfolio")
export class PortfolioController {
  constructor(private readonly portfolio: PortfolioService) {}

  @Post(":userId")
  open(@Param("userId") rawUserId: string): Account {
    const userId = parseUserId(rawUserId);
    const result = this.portfolio.openAccount(userId);
    if (!result.ok) throw rejectionToHttp(result.reason, result.message);
    return result.account;
  }

  @Get(":userId")
  get(@Param("userId") rawUserId: string): PortfolioView {
    const userId = parseUserId(rawUserId);
    const account = this.portfolio.getAccount(userId);
    const valuation = this.portfolio.valueUsd(userId);
    const wallet = this.portfolio.getWallet(userId);
    if (!account || !valuation || !wallet) throw new NotFoundException(`Unknown user ${userId}`);
    return { ...account, valuation, wallet };
  }

  @Get(":userId/transactions")
  transactions(@Param("userId") rawUserId: string, @Query("limit") rawLimit?: string): Transaction[] {
    const userId = parseUserId(rawUserId);
    const limit = parseOrBadRequest(LimitQuerySchema, rawLimit);
    const list = this.portfolio.getTransactions(userId, limit);
    if (!list) throw new NotFoundException(`Unknown user ${userId}`);
    return list;
  }

  @Get(":userId/stats")
  stats(@Param("userId") rawUserId: string): AccountStats {
    const userId = parseUserId(rawUserId);
    const stats = this.portfolio.getStats(userId);
    if (!stats) throw new NotFoundException(`Unknown user ${userId}`);
    return stats;
  }

  @Post(":userId/deposit")
  async deposit(@Param("userId") rawUserId: string, @Body() body: unknown): Promise<Transaction> {
    const userId = parseUserId(rawUserId);
    const { amount } = parseOrBadRequest(AmountRequestSchema, body);
    return unwrap(await this.portfolio.deposit(userId, amount));
  }

  @Post(":userId/withdraw")
  async withdraw(@Param("userId") rawUserId: string, @Body() body: unknown): Promise<Transaction> {
    const userId = parseUserId(rawUserId);
    const { amount } = parseOrBadRequest(AmountRequestSchema, body);
    return unwrap(await this.portfolio.withdraw(userId, amount));
  }

  @Post(":userId/trade")
  async trade(@Param("userId") rawUserId: string, @Body() body: unknown): Promise<Transaction> {
    const userId = parseUserId(rawUserId);
    const request = parseOrBadRequest(ManualTradeRequestSchema, body);
    return unwrap(await this.portfolio.executeTrade(userId, request));
  }
}

function parseUserId(raw: string): string {
  return parseOrBadRequest(UserIdSchema, raw);
}

function unwrap(result: LedgerResult): Transaction {
  if (!result.ok) throw rejectionToHttp(result.reason, result.message);
  return result.transaction;
}
