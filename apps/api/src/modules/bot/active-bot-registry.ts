import type { BotStatus } from "@paperbot/shared";
import { isTerminalPhase } from "@paperbot/shared";

import type { BotRunner } from "./bot-runner";

export type RegisterResult = { ok: true } | { ok: false; reason: "ALREADY_RUNNING" };

/**
 * At most one live runner per user. Registration is a synchronous check-and-insert,
 * so two start requests can never both win. The last terminal status of each user
 * is kept for status queries after the runner is gone.
 */
export class ActiveBotRegistry {
  private readonly active = new Map<string, BotRunner>();
  private readonly finished = new Map<string, BotStatus>();

  tryStart(userId: string, runner: BotRunner): RegisterResult {
    if (this.active.has(userId)) return { ok: false, reason: "ALREADY_RUNNING" };
    this.active.set(userId, runner);
    this.finished.delete(userId);
    return { ok: true };
  }

  isActive(userId: string): boolean {
    return this.active.has(userId);
  }

  get(userId: string): BotRunner | null {
    return this.active.get(userId) ?? null;
  }

  /** Called once a runner reached a terminal phase. Ignores live runners and ones that were replaced. */
  release(runner: BotRunner): void {
    if (!isTerminalPhase(runner.phase)) return;
    if (this.active.get(runner.userId) !== runner) return;
    this.active.delete(runner.userId);
    this.finished.set(runner.userId, runner.status());
  }

  stop(userId: string, reason?: string): BotStatus {
    const runner = this.active.get(userId);
    if (runner) return runner.stop(reason);
    return this.finished.get(userId) ?? { state: "NOT_RUNNING" };
  }

  status(userId: string): BotStatus {
    const runner = this.active.get(userId);
    if (runner) return runner.status();
    return this.finished.get(userId) ?? { state: "NOT_RUNNING" };
  }

  runners(): BotRunner[] {
    return Array.from(this.active.values());
  }
}
