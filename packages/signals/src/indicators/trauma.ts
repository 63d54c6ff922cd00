import type { Candle } from "../types/candle.js";
import type { TraumaResult } from "../types/indicators.js";
import { smaLast } from "./sma.js";
import { averageTrueRange } from "./true-range.js";

/** Share of the average true range subtracted from the moving average. */
export const TRAUMA_ATR_FACTOR = 0.5;

/**
 * Trauma line: SMA of closes over `period` minus half the average true range
 * of the trailing `period` bars (each measured against its predecessor).
 *
 * With fewer than 2 candles the line collapses to the SMA; with none it is
 * `fallback`.
 */
export function traumaLine(candles: Candle[], period: number, fallback: number = NaN): TraumaResult {
  if (period < 1) throw new Error("Trauma period must be >= 1");
  if (candles.length === 0) return { sma: fallback, atr: 0, trauma: fallback };

  const closes = candles.map((c) => c.c);
  const sma = smaLast(closes, period, fallback);

  const ranged = candles.slice(-(period + 1));
  if (ranged.length < 2) return { sma, atr: 0, trauma: sma };

  const atr = averageTrueRange(ranged);
  return { sma, atr, trauma: sma - TRAUMA_ATR_FACTOR * atr };
}
