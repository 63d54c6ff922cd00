import type { Candle, CandleInterval } from "@candle-trader/signals";
import type { FeedResult, MarketDataSource } from "../types/market-data.js";
import { errorMessage, feedError } from "../types/errors.js";
import { toClosedCandles, type OhlcvRow, type RestExchange } from "./ccxt-exchange.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("candlePoller");

export interface CandlePollerConfig {
  exchange: RestExchange;
  symbol: string;
  interval: CandleInterval;
  now?: () => number;
}

/**
 * REST candle source. Each `next` call returns one newly closed candle, in
 * timestamp order, each exactly once. The engine paces the calls, except
 * while a backlog from one fetch is still queued.
 */
export class CcxtCandlePoller implements MarketDataSource {
  readonly kind = "poll" as const;
  private config: CandlePollerConfig;
  private now: () => number;
  private queue: Candle[] = [];
  private lastDeliveredT: number | null = null;

  constructor(config: CandlePollerConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
  }

  async warmup(bars: number): Promise<Candle[]> {
    if (bars <= 0) return [];
    const { exchange, symbol, interval } = this.config;
    const t0 = performance.now();
    // +1 for the in-progress bar the exchange includes
    const rows = await exchange.fetchOHLCV(symbol, interval, undefined, bars + 1);
    const { candles, malformed } = toClosedCandles(rows, interval, this.now());
    if (malformed > 0) {
      log.warn({ action: "warmup", symbol, discarded: malformed }, "Discarded invalid candles during warmup");
    }
    const warm = candles.slice(-bars);
    const last = warm[warm.length - 1];
    if (last) this.lastDeliveredT = last.t;
    log.info({ action: "warmup", symbol, requestedBars: bars, receivedBars: warm.length, latencyMs: Math.round(performance.now() - t0) }, "Warmup complete");
    return warm;
  }

  async next(signal: AbortSignal): Promise<FeedResult> {
    const queued = this.dequeue();
    if (queued) return queued;
    if (signal.aborted) return { kind: "timeout" };

    const { exchange, symbol, interval } = this.config;
    const since = this.lastDeliveredT === null ? undefined : this.lastDeliveredT + 1;
    const t0 = performance.now();
    let rows: OhlcvRow[];
    try {
      rows = await exchange.fetchOHLCV(symbol, interval, since, since === undefined ? 2 : undefined);
    } catch (err) {
      log.warn({ action: "poll", symbol, err, latencyMs: Math.round(performance.now() - t0) }, "Candle fetch failed");
      return { kind: "error", error: feedError("transport", errorMessage(err)) };
    }

    const { candles, malformed } = toClosedCandles(rows, interval, this.now());
    if (malformed > 0) {
      log.warn({ action: "poll", symbol, discarded: malformed }, "Discarded invalid candles during poll");
      if (candles.length === 0) {
        return { kind: "error", error: feedError("malformed", `${malformed} malformed candle rows from ${symbol}`) };
      }
    }

    // With no history only the latest closed bar is new
    const after = this.lastDeliveredT;
    const fresh = after === null ? candles.slice(-1) : candles.filter((c) => c.t > after);
    this.queue.push(...fresh);
    log.debug({ action: "poll", symbol, newCandles: fresh.length, latencyMs: Math.round(performance.now() - t0) }, "Candles polled");

    return this.dequeue() ?? { kind: "timeout" };
  }

  private dequeue(): FeedResult | null {
    const candle = this.queue.shift();
    if (!candle) return null;
    this.lastDeliveredT = candle.t;
    return { kind: "candle", candle, more: this.queue.length > 0 };
  }
}
