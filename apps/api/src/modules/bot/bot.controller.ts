import { BadRequestException, Body, ConflictException, Controller, Get, NotFoundException, Post, Query } from "@nestjs/common";
import type { BotStatus } from "@paperbot/shared";
import { StartBotRequestSchema, StopBotRequestSchema, UserIdSchema } from "@paperbot/shared";

import { parseOrBadRequest } from "../http/request-validation";
import type { StrategyInfo } from "../strategies/strategy-catalog";
import { BotEngineService } from "./bot-engine.service";

@Controller("bot")
export class BotController {
  constructor(private readonly botEngine: BotEngineService) {}

  @Get("strategies")
  strategies(): StrategyInfo[] {
    return this.botEngine.listStrategies();
  }

  @Get("status")
  getStatus(@Query("userId") rawUserId?: string): BotStatus {
    const userId = parseOrBadRequest(UserIdSchema, rawUserId);
    return this.botEngine.status(userId);
  }

  @Post("start")
  start(@Body() body: unknown): BotStatus {
    const request = parseOrBadRequest(StartBotRequestSchema, body);
    const result = this.botEngine.start(request);
    if (result.ok) return result.status;

    switch (result.reason) {
      case "USER_NOT_FOUND":
        throw new NotFoundException(result.message);
      case "ALREADY_RUNNING":
      case "ACCOUNT_LOCKED":
        throw new ConflictException(result.message);
      default:
        throw new BadRequestException(result.message);
    }
  }

  @Post("stop")
  stop(@Body() body: unknown): BotStatus {
    const { userId } = parseOrBadRequest(StopBotRequestSchema, body);
    return this.botEngine.stop(userId);
  }
}
