import { describe, it, expect } from "vitest";
import { traumaLine } from "./trauma.js";
import type { Candle } from "../types/candle.js";

function makeCandle(h: number, l: number, c: number): Candle {
  return { t: 0, o: c, h, l, c, v: 0, n: 0 };
}

describe("traumaLine", () => {
  it("returns the fallback for an empty window", () => {
    expect(traumaLine([], 20, 99)).toEqual({ sma: 99, atr: 0, trauma: 99 });
  });

  it("collapses to the SMA with a single candle", () => {
    const result = traumaLine([makeCandle(110, 90, 100)], 20);
    expect(result.atr).toBe(0);
    expect(result.trauma).toBeCloseTo(100, 10);
    expect(result.trauma).toBe(result.sma);
  });

  it("subtracts half the average true range from the SMA", () => {
    const candles = [
      makeCandle(102, 98, 100),
      makeCandle(106, 100, 104), // TR max(6, 6, 0) = 6
      makeCandle(108, 104, 106), // TR max(4, 4, 0) = 4
    ];
    const result = traumaLine(candles, 2);
    // SMA of last 2 closes = 105; ATR over last 3 bars = (6 + 4) / 2 = 5
    expect(result.sma).toBeCloseTo(105, 10);
    expect(result.atr).toBeCloseTo(5, 10);
    expect(result.trauma).toBeCloseTo(102.5, 10);
  });

  it("only measures ranges inside the trailing period", () => {
    const candles = [
      makeCandle(500, 1, 250), // huge bar outside period + 1
      makeCandle(102, 98, 100),
      makeCandle(106, 100, 104),
      makeCandle(108, 104, 106),
    ];
    expect(traumaLine(candles, 2).atr).toBeCloseTo(5, 10);
  });
});
