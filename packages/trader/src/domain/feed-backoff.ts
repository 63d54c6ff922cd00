import type { FeedStatus } from "../types/status.js";

export type FeedOutcome = "candle" | "timeout" | "error";

export interface FeedBackoffConfig {
  /** Wait after a candle or timeout. 0 for sources that block inside `next`. */
  pollIntervalMs: number;
  errorBackoffMs: number;
}

/** Pacing state for the consumer loop, exposed in status as-is. */
export class FeedBackoff {
  private config: FeedBackoffConfig;
  private lastErrorAt: number | null = null;
  private lastCandleAt: number | null = null;
  private consecutiveErrors = 0;
  private backoffMs = 0;

  constructor(config: FeedBackoffConfig) {
    this.config = config;
  }

  /**
   * Record a cycle outcome and return how long to wait before the next one.
   * `backlog` marks a candle the source already had queued behind others.
   */
  record(outcome: FeedOutcome, now: number, backlog = false): number {
    if (outcome === "error") {
      this.lastErrorAt = now;
      this.consecutiveErrors++;
      this.backoffMs = this.config.errorBackoffMs;
    } else {
      if (outcome === "candle") this.lastCandleAt = now;
      this.consecutiveErrors = 0;
      this.backoffMs = outcome === "candle" && backlog ? 0 : this.config.pollIntervalMs;
    }
    return this.backoffMs;
  }

  getConsecutiveErrors(): number {
    return this.consecutiveErrors;
  }

  status(kind: FeedStatus["kind"]): FeedStatus {
    return {
      kind,
      lastCandleAt: this.lastCandleAt,
      lastErrorAt: this.lastErrorAt,
      consecutiveErrors: this.consecutiveErrors,
      backoffMs: this.backoffMs,
    };
  }
}
