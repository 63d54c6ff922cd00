import type { Candle } from "../types/candle.js";

/** High-low range of `bar`, widened by any gap from the previous close. */
export function trueRange(bar: Candle, prev: Candle | null): number {
  const hl = bar.h - bar.l;
  if (prev === null) return hl;
  return Math.max(hl, Math.abs(bar.h - prev.c), Math.abs(bar.l - prev.c));
}

/**
 * Plain mean of the true ranges of consecutive pairs in `candles`.
 * Needs at least 2 candles; returns NaN otherwise.
 */
export function averageTrueRange(candles: readonly Candle[]): number {
  if (candles.length < 2) return NaN;
  let sum = 0;
  for (let i = 1; i < candles.length; i++) {
    sum += trueRange(candles[i], candles[i - 1]);
  }
  return sum / (candles.length - 1);
}
