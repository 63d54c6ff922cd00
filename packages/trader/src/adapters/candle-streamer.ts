import { backoffDelay } from "@candle-trader/kit";
import { intervalToMs, type Candle, type CandleInterval } from "@candle-trader/signals";
import type { FeedResult, MarketDataSource } from "../types/market-data.js";
import { errorMessage, feedError, type FeedError } from "../types/errors.js";
import { parseOhlcvRow, toClosedCandles, type OhlcvRow, type ProExchange, type RestExchange } from "./ccxt-exchange.js";
import { abortableSleep } from "../lib/abortable-sleep.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("candleStreamer");

const SILENCE_INTERVALS = 3;

export interface CandleStreamerConfig {
  exchange: ProExchange;
  symbol: string;
  interval: CandleInterval;
  /** REST exchange used for warmup history. */
  rest?: RestExchange;
  /** Default: 3 × interval. */
  silenceTimeoutMs?: number;
  reconnectBaseMs?: number;
}

/**
 * Websocket candle source over ccxt pro `watchOHLCV`.
 *
 * A bar is closed when a newer timestamp shows up; its last seen values are
 * final. Closed bars queue until `next` takes them. Stream failures reconnect
 * with exponential backoff and surface once as a transport error.
 */
export class CcxtCandleStreamer implements MarketDataSource {
  readonly kind = "stream" as const;
  private config: CandleStreamerConfig;
  private silenceTimeoutMs: number;
  private queue: Candle[] = [];
  private waiter: ((result: FeedResult) => void) | null = null;
  private pendingError: FeedError | null = null;
  private inProgress: Candle | null = null;
  private lastDeliveredT: number | null = null;
  private stopController: AbortController | null = null;
  private reconnectAttempt = 0;

  constructor(config: CandleStreamerConfig) {
    this.config = config;
    this.silenceTimeoutMs = config.silenceTimeoutMs ?? SILENCE_INTERVALS * intervalToMs(config.interval);
  }

  async warmup(bars: number): Promise<Candle[]> {
    const { rest, symbol, interval } = this.config;
    if (!rest || bars <= 0) return [];
    const t0 = performance.now();
    const rows = await rest.fetchOHLCV(symbol, interval, undefined, bars + 1);
    const { candles, malformed } = toClosedCandles(rows, interval, Date.now());
    if (malformed > 0) {
      log.warn({ action: "warmup", symbol, discarded: malformed }, "Discarded invalid candles during warmup");
    }
    const warm = candles.slice(-bars);
    const last = warm[warm.length - 1];
    if (last) this.lastDeliveredT = last.t;
    log.info({ action: "warmup", symbol, requestedBars: bars, receivedBars: warm.length, latencyMs: Math.round(performance.now() - t0) }, "Warmup complete");
    return warm;
  }

  next(signal: AbortSignal): Promise<FeedResult> {
    this.ensureStreaming();

    const candle = this.queue.shift();
    if (candle) return Promise.resolve({ kind: "candle", candle });
    if (this.pendingError) {
      const error = this.pendingError;
      this.pendingError = null;
      return Promise.resolve({ kind: "error", error });
    }
    if (signal.aborted) return Promise.resolve({ kind: "timeout" });

    return new Promise<FeedResult>((resolve) => {
      const finish = (result: FeedResult): void => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        if (this.waiter === finish) this.waiter = null;
        resolve(result);
      };
      const onAbort = (): void => finish({ kind: "timeout" });
      const timer = setTimeout(() => {
        log.warn({ action: "next", symbol: this.config.symbol, silentMs: this.silenceTimeoutMs }, "Candle stream silent");
        finish({ kind: "timeout" });
      }, this.silenceTimeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiter = finish;
    });
  }

  async close(): Promise<void> {
    if (!this.stopController) return;
    this.stopController.abort();
    this.stopController = null;
    this.waiter?.({ kind: "timeout" });
    // ccxt rejects pending watches on close, which ends the pump
    await this.config.exchange.close?.();
  }

  private ensureStreaming(): void {
    if (this.stopController) return;
    const controller = new AbortController();
    this.stopController = controller;
    this.pump(controller.signal).catch((err) => {
      log.error({ action: "pump", err }, "Candle stream loop failed");
    });
  }

  private async pump(stop: AbortSignal): Promise<void> {
    const { exchange, symbol, interval } = this.config;
    while (!stop.aborted) {
      try {
        const rows = await exchange.watchOHLCV(symbol, interval);
        if (stop.aborted) break;
        this.reconnectAttempt = 0;
        this.onRows(rows);
      } catch (err) {
        if (stop.aborted) break;
        this.reconnectAttempt++;
        const delay = backoffDelay(this.reconnectAttempt, this.config.reconnectBaseMs);
        log.error({ action: "pump", symbol, err, delay, attempt: this.reconnectAttempt }, "WS stream error, reconnecting");
        this.deliverError(feedError("transport", errorMessage(err)));
        if (!(await abortableSleep(delay, stop))) break;
      }
    }
  }

  private onRows(rows: readonly OhlcvRow[]): void {
    const lastRow = rows[rows.length - 1];
    if (!lastRow) return;
    const current = parseOhlcvRow(lastRow);
    if (!current) {
      this.deliverError(feedError("malformed", `malformed OHLCV row from ${this.config.symbol}`));
      return;
    }
    const prev = this.inProgress;
    if (prev && current.t > prev.t) this.deliverCandle(prev);
    if (!prev || current.t >= prev.t) this.inProgress = current;
  }

  private deliverCandle(candle: Candle): void {
    if (this.lastDeliveredT !== null && candle.t <= this.lastDeliveredT) return;
    this.lastDeliveredT = candle.t;
    if (this.waiter) {
      this.waiter({ kind: "candle", candle });
    } else {
      this.queue.push(candle);
    }
  }

  private deliverError(error: FeedError): void {
    if (this.waiter) {
      this.waiter({ kind: "error", error });
    } else {
      this.pendingError = error;
    }
  }
}
