import type { Candle } from "@candle-trader/signals";
import type { FeedError } from "./errors.js";

export type FeedResult =
  /** `more`: the source already holds further closed candles, so no pause is due. */
  | { kind: "candle"; candle: Candle; more?: boolean }
  | { kind: "timeout" }
  | { kind: "error"; error: FeedError };

/**
 * Source of closed candles for one instrument, delivered one at a time in
 * arrival order. `next` resolves with a timeout (never rejects) when the
 * signal aborts.
 */
export interface MarketDataSource {
  /** Polling sources are paced by the engine; the others block inside `next`. */
  readonly kind: "poll" | "stream" | "replay";
  next(signal: AbortSignal): Promise<FeedResult>;
  /** Up to `bars` recent closed candles, oldest first. */
  warmup?(bars: number): Promise<Candle[]>;
  close?(): Promise<void>;
}
