import { Body, Controller, Get, Param, Post, Query } from "@nestjs/common";
import type { IndicatorSnapshot, PricePoint } from "@paperbot/shared";
import { AssetSchema, IndicatorIdSchema, PriceIngestRequestSchema } from "@paperbot/shared";
import { z } from "zod";

import { parseOrBadRequest } from "../http/request-validation";
import { IndicatorService } from "../indicators/indicator-snapshot";
import { type IngestResult, PriceStoreService } from "./price-store.service";

const LimitQuerySchema = z.coerce.number().int().min(1).optional();

const IndicatorIdsQuerySchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((id) => id.trim().toLowerCase())
      .filter((id) => id.length > 0)
  )
  .pipe(z.array(IndicatorIdSchema).min(1).max(20));

type IndicatorView = {
  asset: string;
  points: number;
  latest: PricePoint | null;
  indicators: IndicatorSnapshot;
  /** Full series aligned with the window, present when requested with `series=true`. */
  series?: Record<string, Array<number | null>>;
};

const SeriesFlagSchema = z
  .enum(["true", "false"])
  .optional()
  .transform((value) => value === "true");

@Controller("market")
export class MarketController {
  constructor(
    private readonly priceStore: PriceStoreService,
    private readonly indicatorService: IndicatorService
  ) {}

  @Post("prices")
  ingest(@Body() body: unknown): IngestResult {
    const points = parseOrBadRequest(PriceIngestRequestSchema, body);
    return this.priceStore.ingest(points);
  }

  @Get("assets")
  assets(): string[] {
    return this.priceStore.assets();
  }

  @Get("prices/:asset")
  prices(@Param("asset") rawAsset: string, @Query("limit") rawLimit?: string): PricePoint[] {
    const asset = parseOrBadRequest(AssetSchema, rawAsset);
    const limit = parseOrBadRequest(LimitQuerySchema, rawLimit);
    return this.priceStore.window(asset, limit);
  }

  @Get("indicators/:asset")
  indicators(
    @Param("asset") rawAsset: string,
    @Query("ids") rawIds?: string,
    @Query("limit") rawLimit?: string,
    @Query("series") rawSeries?: string
  ): IndicatorView {
    const asset = parseOrBadRequest(AssetSchema, rawAsset);
    const ids = parseOrBadRequest(IndicatorIdsQuerySchema, rawIds ?? "");
    const limit = parseOrBadRequest(LimitQuerySchema, rawLimit);
    const withSeries = parseOrBadRequest(SeriesFlagSchema, rawSeries);

    const window = this.priceStore.window(asset, limit);
    const prices = window.map((p) => p.price);
    const view: IndicatorView = {
      asset,
      points: window.length,
      latest: window[window.length - 1] ?? null,
      indicators: this.indicatorService.compute(prices, ids)
    };
    if (withSeries) view.series = this.indicatorService.series(prices, ids);
    return view;
  }
}
