import { Controller, Get } from "@nestjs/common";
import type { EngineConfig } from "@paperbot/shared";

import { ConfigService } from "./config.service";

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getConfig(): EngineConfig {
    return this.configService.load();
  }
}
