import { z } from "zod";

import { AssetSchema } from "./market";

export const UserIdSchema = z.string().trim().min(1).max(64);

export const TransactionKindSchema = z.enum(["TRADE", "DEPOSIT", "WITHDRAWAL"]);
export type TransactionKind = z.infer<typeof TransactionKindSchema>;

export const TradeSideSchema = z.enum(["BUY", "SELL"]);
export type TradeSide = z.infer<typeof TradeSideSchema>;

export const TransactionSchema = z.object({
  id: z.string().min(1),
  userId: UserIdSchema,
  kind: TransactionKindSchema,
  baseAsset: z.string().min(1),
  quoteAsset: z.string().min(1),
  side: TradeSideSchema.optional(),
  quantity: z.number().positive(),
  price: z.number().positive(),
  notional: z.number().positive(),
  ts: z.string().min(1),
  baseUsdPrice: z.number().positive().optional(),
  quoteUsdPrice: z.number().positive().optional(),
  botName: z.string().min(1).optional()
});
export type Transaction = z.infer<typeof TransactionSchema>;

export const AccountSchema = z.object({
  userId: UserIdSchema,
  balances: z.record(z.number().nonnegative()),
  transactions: z.array(TransactionSchema)
});
export type Account = z.infer<typeof AccountSchema>;

export const LEDGER_SNAPSHOT_VERSION = 1 as const;

export const LedgerSnapshotSchema = z.object({
  version: z.literal(LEDGER_SNAPSHOT_VERSION),
  savedAt: z.string().min(1),
  accounts: z.array(AccountSchema)
});
export type LedgerSnapshot = z.infer<typeof LedgerSnapshotSchema>;

export const LedgerRejectionSchema = z.enum([
  "USER_NOT_FOUND",
  "ACCOUNT_EXISTS",
  "ACCOUNT_LOCKED",
  "INVALID_AMOUNT",
  "INSUFFICIENT_FUNDS",
  "INSUFFICIENT_ASSETS",
  "PRICE_UNAVAILABLE",
  "DEPOSIT_TOO_SMALL",
  "DEPOSIT_TOO_LARGE",
  "WITHDRAWAL_EXCEEDS_BALANCE"
]);
export type LedgerRejection = z.infer<typeof LedgerRejectionSchema>;

export const AmountRequestSchema = z.object({
  amount: z.number().finite()
});
export type AmountRequest = z.infer<typeof AmountRequestSchema>;

export const ManualTradeRequestSchema = z.object({
  baseAsset: AssetSchema,
  quoteAsset: AssetSchema,
  side: TradeSideSchema,
  quantity: z.number().finite()
});
export type ManualTradeRequest = z.infer<typeof ManualTradeRequestSchema>;

export type AccountStats = {
  userId: string;
  transactions: number;
  trades: number;
  buys: number;
  sells: number;
  botTrades: number;
  deposits: number;
  withdrawals: number;
  depositedTotal: number;
  withdrawnTotal: number;
  buyNotionalUsd: number;
  sellNotionalUsd: number;
  firstActivityAt?: string;
  lastActivityAt?: string;
};
