import { Module } from "@nestjs/common";

import { BotModule } from "./bot/bot.module";
import { ConfigModule } from "./config/config.module";
import { ConfigPublicModule } from "./config/config.public.module";
import { HealthModule } from "./health/health.module";
import { LoggingModule } from "./logging/logging.module";
import { MarketModule } from "./market/market.module";
import { PortfolioModule } from "./portfolio/portfolio.module";

@Module({
  imports: [LoggingModule, ConfigModule, HealthModule, ConfigPublicModule, MarketModule, PortfolioModule, BotModule]
})
export class AppModule {}
