import { Inject, Injectable } from "@nestjs/common";
import type { PricePoint } from "@paperbot/shared";

import { ConfigService } from "../config/config.service";
import { APP_LOGGER, type AppLogger } from "../logging/pino-logger";
import { PriceWindow } from "./price-window";

export type IngestResult = {
  accepted: number;
  rejected: Array<{ asset: string; ts: string; reason: string }>;
};

@Injectable()
export class PriceStoreService {
  private readonly windows = new Map<string, PriceWindow>();
  readonly homeAsset: string;
  private readonly capacity: number;

  constructor(
    configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: AppLogger
  ) {
    const config = configService.load();
    this.homeAsset = config.homeAsset;
    this.capacity = config.priceWindowCapacity;
  }

  ingest(points: PricePoint | PricePoint[]): IngestResult {
    const list = Array.isArray(points) ? points : [points];
    const result: IngestResult = { accepted: 0, rejected: [] };

    for (const point of list) {
      const asset = point.asset.toUpperCase();
      if (asset === this.homeAsset) {
        result.rejected.push({ asset, ts: point.ts, reason: `${asset} is the home asset and is always priced at 1` });
        continue;
      }
      if (this.windowFor(asset).append({ ...point, asset })) {
        result.accepted += 1;
      } else {
        result.rejected.push({ asset, ts: point.ts, reason: "Timestamp is not newer than the latest sample" });
      }
    }

    if (result.rejected.length > 0) {
      this.logger.warn({ msg: "Price points refused", rejected: result.rejected.length, sample: result.rejected[0] });
    }
    return result;
  }

  assets(): string[] {
    return Array.from(this.windows.keys()).sort();
  }

  window(asset: string, limit?: number): PricePoint[] {
    return this.windows.get(asset.toUpperCase())?.snapshot(limit) ?? [];
  }

  latest(asset: string): PricePoint | null {
    return this.windows.get(asset.toUpperCase())?.latest() ?? null;
  }

  /** Price of one unit of `asset` in the home asset (USD), null when never observed. */
  usdPrice(asset: string): number | null {
    const upper = asset.toUpperCase();
    if (upper === this.homeAsset) return 1;
    return this.latest(upper)?.price ?? null;
  }

  /** Price of one unit of `base` expressed in `quote`. */
  pairPrice(base: string, quote: string): number | null {
    const baseUsd = this.usdPrice(base);
    const quoteUsd = this.usdPrice(quote);
    if (baseUsd === null || quoteUsd === null) return null;
    if (base.toUpperCase() === quote.toUpperCase()) return 1;
    return baseUsd / quoteUsd;
  }

  private windowFor(asset: string): PriceWindow {
    let window = this.windows.get(asset);
    if (!window) {
      window = new PriceWindow(asset, this.capacity);
      this.windows.set(asset, window);
    }
    return window;
  }
}
