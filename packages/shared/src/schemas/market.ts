import { z } from "zod";

export const AssetSchema = z
  .string()
  .trim()
  .min(1)
  .max(16)
  .transform((value) => value.toUpperCase());

export const PricePointSchema = z.object({
  ts: z.string().datetime({ offset: true }),
  asset: AssetSchema,
  price: z.number().positive().finite()
});
export type PricePoint = z.infer<typeof PricePointSchema>;

export const PriceIngestRequestSchema = z.union([PricePointSchema, z.array(PricePointSchema).min(1)]);
export type PriceIngestRequest = z.infer<typeof PriceIngestRequestSchema>;

export const IndicatorKindSchema = z.enum(["sma", "ema", "rsi"]);
export type IndicatorKind = z.infer<typeof IndicatorKindSchema>;

export const IndicatorIdSchema = z
  .string()
  .trim()
  .regex(/^(sma|ema|rsi)_[1-9][0-9]{0,3}$/, "Indicator id must look like sma_20, ema_12 or rsi_14");
export type IndicatorId = z.infer<typeof IndicatorIdSchema>;

/** Latest value per indicator id; null while the indicator is still warming up. */
export type IndicatorSnapshot = Readonly<Record<string, number | null>>;
