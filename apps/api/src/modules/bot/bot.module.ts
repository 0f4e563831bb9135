import { Module } from "@nestjs/common";

import { MarketModule } from "../market/market.module";
import { PortfolioModule } from "../portfolio/portfolio.module";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";

@Module({
  imports: [MarketModule, PortfolioModule],
  controllers: [BotController],
  providers: [BotEngineService],
  exports: [BotEngineService]
})
export class BotModule {}
