import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { EngineConfig } from "@paperbot/shared";
import { applyEnvOverrides, EngineConfigSchema } from "@paperbot/shared";

import { resolveDataDir } from "../logging/pino-logger";

export function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

@Injectable()
export class ConfigService {
  private cachedConfig: EngineConfig | null = null;
  private cachedMtimeMs: number | null = null;

  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  get dataDir(): string {
    return this.env.DATA_DIR ?? resolveDataDir();
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  migrateOnStartup(): { migrated: boolean; reason: "defaults" | "up_to_date" | "normalized" } {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return { migrated: false, reason: "defaults" };
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const normalized = EngineConfigSchema.parse(JSON.parse(raw));
    const nextJson = JSON.stringify(normalized, null, 2);
    if (raw.trim() !== nextJson.trim()) {
      atomicWriteFile(this.configPath, nextJson);
    }

    this.cachedConfig = normalized;
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
    return raw.trim() === nextJson.trim() ? { migrated: false, reason: "up_to_date" } : { migrated: true, reason: "normalized" };
  }

  /** Effective configuration: config.json (or defaults) with environment overrides applied. */
  load(): EngineConfig {
    return applyEnvOverrides(this.loadFile(), this.env);
  }

  private loadFile(): EngineConfig {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return EngineConfigSchema.parse({});
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const parsed = EngineConfigSchema.parse(JSON.parse(raw));
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }
}
