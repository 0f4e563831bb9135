import { Module } from "@nestjs/common";

import { IndicatorService } from "../indicators/indicator-snapshot";
import { MarketController } from "./market.controller";
import { PriceStoreService } from "./price-store.service";

@Module({
  controllers: [MarketController],
  providers: [PriceStoreService, IndicatorService],
  exports: [PriceStoreService, IndicatorService]
})
export class MarketModule {}
