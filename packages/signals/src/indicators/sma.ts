import { SMA as SMAIndicator } from "trading-signals";

/**
 * Simple Moving Average of the trailing `period` values (via trading-signals).
 * With fewer values than `period`, averages what is available.
 * Returns `fallback` for empty input.
 */
export function smaLast(values: number[], period: number, fallback: number = NaN): number {
  if (period < 1) throw new Error("SMA period must be >= 1");
  if (values.length === 0) return fallback;

  const span = Math.min(period, values.length);
  const indicator = new SMAIndicator(span);
  for (let i = values.length - span; i < values.length; i++) {
    indicator.add(values[i]);
  }
  return indicator.isStable ? Number(indicator.getResult()) : fallback;
}
