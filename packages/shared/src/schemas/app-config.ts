import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

// 24h of 5-second samples.
export const DEFAULT_PRICE_WINDOW_CAPACITY = 17_280;
// 1h of 5-second samples handed to strategies each cycle.
export const DEFAULT_CONTEXT_WINDOW_SIZE = 720;

export const LedgerSettingsSchema = z.object({
  depositMin: z.number().positive().default(10),
  depositMax: z.number().positive().default(100_000),
  persist: z.boolean().default(true)
});
export type LedgerSettings = z.infer<typeof LedgerSettingsSchema>;

export const ApiSettingsSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(1).max(65535).default(8148)
});
export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

export const EngineConfigSchema = z
  .object({
    version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
    homeAsset: z.string().min(1).default("USD"),
    cycleIntervalMs: z.number().int().min(1_000).max(86_400_000).default(60_000),
    priceWindowCapacity: z.number().int().min(1).max(1_000_000).default(DEFAULT_PRICE_WINDOW_CAPACITY),
    contextWindowSize: z.number().int().min(1).max(1_000_000).default(DEFAULT_CONTEXT_WINDOW_SIZE),
    ledger: LedgerSettingsSchema.default({}),
    api: ApiSettingsSchema.default({})
  })
  .superRefine((value, ctx) => {
    if (value.ledger.depositMin > value.ledger.depositMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "ledger.depositMin must not exceed ledger.depositMax",
        path: ["ledger", "depositMin"]
      });
    }
    if (value.contextWindowSize > value.priceWindowCapacity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "contextWindowSize must not exceed priceWindowCapacity",
        path: ["contextWindowSize"]
      });
    }
  });
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

/**
 * Environment variables win over the file. Only the knobs an operator tends to flip
 * per deployment are read here; everything else lives in config.json.
 */
export function applyEnvOverrides(config: EngineConfig, env: Record<string, string | undefined>): EngineConfig {
  const port = env.PORT ? Number.parseInt(env.PORT, 10) : undefined;
  const cycleIntervalMs = env.CYCLE_INTERVAL_MS ? Number.parseInt(env.CYCLE_INTERVAL_MS, 10) : undefined;

  return EngineConfigSchema.parse({
    ...config,
    cycleIntervalMs: cycleIntervalMs !== undefined && Number.isFinite(cycleIntervalMs) ? cycleIntervalMs : config.cycleIntervalMs,
    api: {
      ...config.api,
      host: env.API_HOST ?? config.api.host,
      port: port !== undefined && Number.isFinite(port) ? port : config.api.port
    }
  });
}
