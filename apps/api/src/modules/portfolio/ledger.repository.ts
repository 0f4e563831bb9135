import fs from "node:fs";
import path from "node:path";

import type { Account } from "@paperbot/shared";
import { LEDGER_SNAPSHOT_VERSION, LedgerSnapshotSchema } from "@paperbot/shared";

import { atomicWriteFile } from "../config/config.service";

export const LEDGER_REPOSITORY = Symbol("LEDGER_REPOSITORY");

/**
 * Persistence seam for user accounts. `load` seeds the ledger once at startup and
 * `save` receives the full account set after every applied mutation.
 */
export interface LedgerRepository {
  load(): Account[];
  save(accounts: Account[]): void;
}

export class FileLedgerRepository implements LedgerRepository {
  constructor(private readonly filePath: string) {}

  load(): Account[] {
    if (!fs.existsSync(this.filePath)) return [];
    const raw = fs.readFileSync(this.filePath, "utf-8");
    return LedgerSnapshotSchema.parse(JSON.parse(raw)).accounts;
  }

  save(accounts: Account[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const snapshot = LedgerSnapshotSchema.parse({
      version: LEDGER_SNAPSHOT_VERSION,
      savedAt: new Date().toISOString(),
      accounts
    });
    atomicWriteFile(this.filePath, JSON.stringify(snapshot, null, 2));
  }
}

/** Keeps the last saved snapshot in memory; used when persistence is switched off. */
export class InMemoryLedgerRepository implements LedgerRepository {
  private accounts: Account[];
  saves = 0;

  constructor(seed: Account[] = []) {
    this.accounts = structuredClone(seed);
  }

  load(): Account[] {
    return structuredClone(this.accounts);
  }

  save(accounts: Account[]): void {
    this.accounts = structuredClone(accounts);
    this.saves += 1;
  }
}
