import { describe, it, expect } from "vitest";
import { PriceWindow } from "./price-window.js";
import type { Candle } from "../types/candle.js";

const makeCandle = (i: number, c = 100 + i): Candle => ({
  t: 1_700_000_000_000 + i * 60_000, o: c, h: c + 1, l: c - 1, c, v: 10, n: 0,
});

describe("PriceWindow", () => {
  it("appends in order and reports the latest candle", () => {
    const prices = new PriceWindow(5);
    expect(prices.latest()).toBeNull();
    expect(prices.push(makeCandle(0))).toBe("appended");
    expect(prices.push(makeCandle(1))).toBe("appended");
    expect(prices.size()).toBe(2);
    expect(prices.latest()?.c).toBe(101);
  });

  it("evicts the oldest candle beyond capacity", () => {
    const prices = new PriceWindow(3);
    for (let i = 0; i < 5; i++) prices.push(makeCandle(i));
    expect(prices.size()).toBe(3);
    expect(prices.toArray().map((c) => c.c)).toEqual([102, 103, 104]);
  });

  it("replaces a candle with a duplicate timestamp, keeping the latest", () => {
    const prices = new PriceWindow(3);
    prices.push(makeCandle(0));
    prices.push(makeCandle(1));
    expect(prices.push(makeCandle(1, 250))).toBe("replaced");
    expect(prices.size()).toBe(2);
    expect(prices.latest()?.c).toBe(250);
  });

  it("rejects a candle older than the newest one", () => {
    const prices = new PriceWindow(3);
    prices.push(makeCandle(2));
    expect(prices.push(makeCandle(1))).toBe("stale");
    expect(prices.size()).toBe(1);
  });

  it("stores immutable copies", () => {
    const prices = new PriceWindow(3);
    const candle = makeCandle(0);
    prices.push(candle);
    candle.c = 999;
    expect(prices.latest()?.c).toBe(100);
    expect(Object.isFrozen(prices.latest())).toBe(true);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new PriceWindow(0)).toThrow("positive integer");
  });

  it("clears all candles", () => {
    const prices = new PriceWindow(3);
    prices.push(makeCandle(0));
    prices.clear();
    expect(prices.size()).toBe(0);
  });
});
