import type { Candle } from "@candle-trader/signals";
import type { FeedResult, MarketDataSource } from "../types/market-data.js";

/** Serves a fixed candle list in order. Once exhausted, `next` waits for abort. */
export class ReplaySource implements MarketDataSource {
  readonly kind = "replay" as const;
  private candles: Candle[];
  private cursor = 0;

  constructor(candles: readonly Candle[]) {
    this.candles = [...candles];
  }

  async next(signal: AbortSignal): Promise<FeedResult> {
    const candle = this.candles[this.cursor];
    if (candle) {
      this.cursor++;
      return { kind: "candle", candle };
    }
    if (signal.aborted) return { kind: "timeout" };
    await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    return { kind: "timeout" };
  }

  remaining(): number {
    return this.candles.length - this.cursor;
  }
}
