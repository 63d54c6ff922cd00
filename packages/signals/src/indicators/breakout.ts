import type { Candle } from "../types/candle.js";
import type { BreakoutResult } from "../types/indicators.js";

export const DEFAULT_VOLUME_SURGE = 1.2;

const NO_BREAKOUT: BreakoutResult = { direction: "none", resistance: null, support: null, avgVolume: null };

/**
 * Volume-confirmed breakout of the trailing `lookback` candles.
 *
 * Resistance, support and average volume come from every candle of the
 * window except the last one; the last candle breaks out when it closes
 * beyond them AND its volume exceeds `volumeSurge` × average volume.
 * Price alone never triggers.
 */
export function detectBreakout(
  candles: Candle[],
  lookback: number,
  volumeSurge: number = DEFAULT_VOLUME_SURGE,
): BreakoutResult {
  if (lookback < 2) throw new Error("Breakout lookback must be >= 2");
  if (candles.length < lookback) return NO_BREAKOUT;

  const start = candles.length - lookback;
  const last = candles.length - 1;
  let resistance = -Infinity;
  let support = Infinity;
  let volume = 0;
  for (let i = start; i < last; i++) {
    if (candles[i].h > resistance) resistance = candles[i].h;
    if (candles[i].l < support) support = candles[i].l;
    volume += candles[i].v;
  }
  const avgVolume = volume / (lookback - 1);

  const current = candles[last];
  const surge = current.v > volumeSurge * avgVolume;

  let direction: BreakoutResult["direction"] = "none";
  if (surge && current.c > resistance) direction = "up";
  else if (surge && current.c < support) direction = "down";

  return { direction, resistance, support, avgVolume };
}
