import path from "node:path";

import { Module } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { MarketModule } from "../market/market.module";
import { FileLedgerRepository, InMemoryLedgerRepository, LEDGER_REPOSITORY, type LedgerRepository } from "./ledger.repository";
import { PortfolioController } from "./portfolio.controller";
import { PortfolioService } from "./portfolio.service";

@Module({
  imports: [MarketModule],
  controllers: [PortfolioController],
  providers: [
    {
      provide: LEDGER_REPOSITORY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): LedgerRepository =>
        configService.load().ledger.persist
          ? new FileLedgerRepository(path.join(configService.dataDir, "ledger.json"))
          : new InMemoryLedgerRepository()
    },
    PortfolioService
  ],
  exports: [PortfolioService]
})
export class PortfolioModule {}
