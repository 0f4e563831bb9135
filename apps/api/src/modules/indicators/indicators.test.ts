import { describe, expect, it } from "vitest";

import { computeIndicatorSnapshot, parseIndicatorId } from "./indicator-snapshot";
import { ema, rsi, sma } from "./indicators";

const PRICES = [100, 102, 101, 103, 105, 104, 106];

describe("sma", () => {
  it("averages each trailing window after warm-up", () => {
    expect(sma(PRICES, 3)).toEqual([null, null, 101, 102, 103, 104, 105]);
  });

  it("is all null when the series is shorter than the period", () => {
    expect(sma([100, 102], 3)).toEqual([null, null]);
  });
});

describe("ema", () => {
  it("seeds with the sma and then smooths", () => {
    const values = ema(PRICES, 3);
    expect(values.slice(0, 2)).toEqual([null, null]);
    expect(values[2]).toBeCloseTo(101, 10);
    expect(values[3]).toBeCloseTo(102, 10);
    expect(values[4]).toBeCloseTo(103.5, 10);
    expect(values[5]).toBeCloseTo(103.75, 10);
    expect(values[6]).toBeCloseTo(104.875, 10);
  });
});

describe("rsi", () => {
  it("needs period + 1 prices", () => {
    expect(rsi([1, 2, 3], 3)).toEqual([null, null, null]);
    expect(rsi([1, 2, 3, 4], 3)[3]).toBe(100);
  });

  it("sits at 50 on a flat series", () => {
    expect(rsi([5, 5, 5, 5, 5], 2).slice(2)).toEqual([50, 50, 50]);
  });

  it("balances equal gains and losses", () => {
    // diffs +2, -2 -> avgGain 1, avgLoss 1
    expect(rsi([10, 12, 10], 2)[2]).toBe(50);
  });
});

describe("computeIndicatorSnapshot", () => {
  it("reports the latest value or null while warming up", () => {
    const snapshot = computeIndicatorSnapshot([1, 2, 3], ["sma_2", "sma_5", "RSI_2"]);

    expect(snapshot).toEqual({ sma_2: 2.5, sma_5: null, rsi_2: 100 });
  });

  it("returns null for every indicator on an empty series", () => {
    expect(computeIndicatorSnapshot([], ["ema_3"])).toEqual({ ema_3: null });
  });

  it("rejects malformed ids", () => {
    expect(() => parseIndicatorId("macd_12")).toThrow();
    expect(() => parseIndicatorId("sma_0")).toThrow();
    expect(parseIndicatorId("ema_26")).toEqual({ id: "ema_26", kind: "ema", period: 26 });
  });
});
