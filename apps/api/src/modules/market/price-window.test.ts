import { describe, expect, it } from "vitest";

import { PriceWindow } from "./price-window";

function at(second: number, price: number) {
  return { ts: new Date(Date.UTC(2024, 0, 1, 0, 0, second)).toISOString(), asset: "BTC", price };
}

describe("PriceWindow", () => {
  it("keeps exactly the most recent capacity points in order after overflow", () => {
    const window = new PriceWindow("BTC", 5);
    for (let i = 1; i <= 13; i += 1) {
      expect(window.append(at(i, 100 + i))).toBe(true);
      expect(window.size).toBe(Math.min(i, 5));
    }

    expect(window.prices()).toEqual([109, 110, 111, 112, 113]);
    expect(window.latest()?.price).toBe(113);
  });

  it("returns fewer points than requested when the window is short", () => {
    const window = new PriceWindow("BTC", 10);
    window.append(at(1, 1));
    window.append(at(2, 2));

    expect(window.prices(5)).toEqual([1, 2]);
    expect(window.prices(1)).toEqual([2]);
    expect(window.prices(0)).toEqual([]);
  });

  it("hands out independent copies", () => {
    const window = new PriceWindow("BTC", 3);
    window.append(at(1, 1));
    const snapshot = window.snapshot();
    snapshot.push(at(9, 9));
    window.append(at(2, 2));

    expect(snapshot).toHaveLength(2);
    expect(window.snapshot()).toHaveLength(2);
    expect(Object.isFrozen(window.snapshot()[0])).toBe(true);
  });

  it("refuses duplicate and out-of-order timestamps", () => {
    const window = new PriceWindow("BTC", 3);
    expect(window.append(at(5, 1))).toBe(true);
    expect(window.append(at(5, 2))).toBe(false);
    expect(window.append(at(4, 3))).toBe(false);
    expect(window.prices()).toEqual([1]);
  });

  it("is empty until the first sample arrives", () => {
    const window = new PriceWindow("ETH", 3);
    expect(window.latest()).toBeNull();
    expect(window.snapshot()).toEqual([]);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new PriceWindow("BTC", 0)).toThrow(RangeError);
  });
});
