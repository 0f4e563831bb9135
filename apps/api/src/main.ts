import "reflect-metadata";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { APP_LOGGER, type AppLogger } from "./modules/logging/pino-logger";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });
  const logger = app.get<AppLogger>(APP_LOGGER);

  app.use(json({ limit: "2mb" }));
  app.use(pinoHttp({ logger }));
  app.enableShutdownHooks();

  app.useLogger({
    log: (message) => logger.info({ msg: message }),
    error: (message, trace) => logger.error({ msg: message, trace }),
    warn: (message) => logger.warn({ msg: message }),
    debug: (message) => logger.debug({ msg: message }),
    verbose: (message) => logger.trace({ msg: message })
  });

  const configService = app.get(ConfigService);
  const migration = configService.migrateOnStartup();
  if (migration.migrated) {
    logger.info({ msg: "Config startup migration applied", reason: migration.reason });
  }

  const { api, cycleIntervalMs, homeAsset } = configService.load();
  await app.listen(api.port, api.host);

  logger.info({ msg: "API listening", host: api.host, port: api.port, cycleIntervalMs, homeAsset });
}

bootstrap().catch((err) => {
  console.error(err);
  process.exit(1);
});
