import { BadRequestException, ConflictException, NotFoundException } from "@nestjs/common";
import { describe, expect, it } from "vitest";

import { silentLogger, StaticConfigService } from "../../testing/fixtures";
import { PriceStoreService } from "../market/price-store.service";
import { InMemoryLedgerRepository } from "./ledger.repository";
import { PortfolioController } from "./portfolio.controller";
import { PortfolioService } from "./portfolio.service";

function createController(): PortfolioController {
  const config = new StaticConfigService();
  const logger = silentLogger();
  const prices = new PriceStoreService(config, logger);
  return new PortfolioController(new PortfolioService(config, prices, new InMemoryLedgerRepository(), logger));
}

describe("PortfolioController", () => {
  it("trims the user id the same way on every route", async () => {
    const controller = createController();
    expect(controller.open(" bob ").userId).toBe("bob");

    const deposit = await controller.deposit("bob ", { amount: 50 });
    expect(deposit).toMatchObject({ kind: "DEPOSIT", baseAsset: "USD", quantity: 50 });
    expect(controller.get(" bob").balances).toEqual({ USD: 50 });
    expect(controller.transactions("  bob", "1")).toHaveLength(1);
    expect(controller.stats("bob\t").userId).toBe("bob");
    expect((await controller.withdraw(" bob", { amount: 20 })).quantity).toBe(20);
  });

  it("rejects a blank user id with a 400", async () => {
    const controller = createController();
    expect(() => controller.open("   ")).toThrow(BadRequestException);
    expect(() => controller.get("")).toThrow(BadRequestException);
    expect(() => controller.stats(" ")).toThrow(BadRequestException);
    await expect(controller.deposit(" ", { amount: 50 })).rejects.toThrow(BadRequestException);
  });

  it("maps ledger rejections onto HTTP errors", async () => {
    const controller = createController();
    controller.open("bob");

    expect(() => controller.open("bob")).toThrow(ConflictException);
    expect(() => controller.get("ghost")).toThrow(NotFoundException);
    await expect(controller.deposit("ghost", { amount: 50 })).rejects.toThrow(NotFoundException);
    await expect(controller.deposit("bob", { amount: 5 })).rejects.toThrow(BadRequestException);
    await expect(controller.withdraw("bob", { amount: "ten" })).rejects.toThrow(BadRequestException);
  });
});
