import type { EngineConfig } from "@paperbot/shared";
import { EngineConfigSchema } from "@paperbot/shared";
import pino from "pino";

import { ConfigService } from "../modules/config/config.service";
import type { AppLogger } from "../modules/logging/pino-logger";

export class StaticConfigService extends ConfigService {
  private readonly config: EngineConfig;

  constructor(overrides: Partial<EngineConfig> = {}) {
    super({});
    const capacity = overrides.priceWindowCapacity ?? 17_280;
    this.config = EngineConfigSchema.parse({
      ...overrides,
      contextWindowSize: overrides.contextWindowSize ?? Math.min(720, capacity),
      ledger: { persist: false, ...overrides.ledger }
    });
  }

  override load(): EngineConfig {
    return this.config;
  }
}

export function silentLogger(): AppLogger {
  return pino({ level: "silent" });
}

export function isoAt(second: number): string {
  return new Date(Date.UTC(2024, 0, 1) + second * 1000).toISOString();
}
