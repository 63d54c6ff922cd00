import type { Candle } from "../types/candle.js";

export type PushOutcome = "appended" | "replaced" | "stale";

/**
 * Fixed-capacity, time-ordered FIFO of candles.
 * A candle with the same timestamp as the newest one replaces it; an older
 * candle is rejected so the window never goes back in time.
 */
export class PriceWindow {
  private readonly capacity: number;
  private candles: Candle[] = [];

  constructor(capacity: number = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`PriceWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  push(candle: Candle): PushOutcome {
    const latest = this.latest();
    if (latest && candle.t < latest.t) return "stale";

    const frozen = Object.freeze({ ...candle });
    if (latest && candle.t === latest.t) {
      this.candles[this.candles.length - 1] = frozen;
      return "replaced";
    }

    this.candles.push(frozen);
    if (this.candles.length > this.capacity) {
      this.candles.shift();
    }
    return "appended";
  }

  latest(): Candle | null {
    return this.candles.length > 0 ? this.candles[this.candles.length - 1] : null;
  }

  size(): number {
    return this.candles.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /** Read-only view; callers must not rely on it staying in sync after the next push. */
  toArray(): readonly Candle[] {
    return this.candles.slice();
  }

  clear(): void {
    this.candles = [];
  }
}
