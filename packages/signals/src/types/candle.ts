import { z } from "zod";

/**
 * A closed OHLCV bar. `t` is the bar's open time in epoch ms; `n` is the
 * trade count, 0 when the venue does not report one.
 */
export const CandleSchema = z.object({
  t: z.number().int().nonnegative(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number().nonnegative(),
  n: z.number().int().nonnegative().default(0),
});

export type Candle = z.output<typeof CandleSchema>;

export const CandleInterval = ["1m", "5m", "15m", "30m", "1h", "4h", "1d"] as const;
export type CandleInterval = (typeof CandleInterval)[number];

const MINUTE_MS = 60_000;

const INTERVAL_MS: Readonly<Record<CandleInterval, number>> = {
  "1m": MINUTE_MS,
  "5m": 5 * MINUTE_MS,
  "15m": 15 * MINUTE_MS,
  "30m": 30 * MINUTE_MS,
  "1h": 60 * MINUTE_MS,
  "4h": 240 * MINUTE_MS,
  "1d": 1440 * MINUTE_MS,
};

export function intervalToMs(interval: CandleInterval): number {
  return INTERVAL_MS[interval];
}

/** Positive finite open/close, finite high >= low, non-negative volume. */
export function isValidCandle(c: Candle): boolean {
  const finite = [c.o, c.h, c.l, c.c, c.v].every(Number.isFinite);
  return finite && c.o > 0 && c.c > 0 && c.h >= c.l && c.v >= 0;
}
