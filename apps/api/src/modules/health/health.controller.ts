import { Controller, Get } from "@nestjs/common";

import { PriceStoreService } from "../market/price-store.service";

@Controller("health")
export class HealthController {
  constructor(private readonly priceStore: PriceStoreService) {}

  @Get()
  getHealth(): { ok: true; ts: string; pricedAssets: string[] } {
    return { ok: true, ts: new Date().toISOString(), pricedAssets: this.priceStore.assets() };
  }
}
