import {
  IndicatorEngine,
  SignalPolicy,
  isEntry,
  type Candle,
  type Decision,
  type IndicatorSnapshot,
  type PolicyConfig,
  type PositionSide,
  type SignalType,
} from "@candle-trader/signals";
import type { AlertsClient } from "../types/alerts-client.js";
import type { FeedConfig, TraderConfig } from "../types/config.js";
import type { MarketDataSource, FeedResult } from "../types/market-data.js";
import type { OrderGateway } from "../types/order-gateway.js";
import type { StatusSnapshot } from "../types/status.js";
import type { Trade } from "../types/ledger.js";
import { errorMessage, feedError } from "../types/errors.js";
import { PositionLedger } from "../domain/position-ledger.js";
import { FeedBackoff, type FeedOutcome } from "../domain/feed-backoff.js";
import { summarize } from "../domain/performance.js";
import { abortableSleep } from "../lib/abortable-sleep.js";
import { deepFreeze } from "../lib/deep-freeze.js";
import { logger } from "../lib/logger.js";

const log = logger.createChild("tradingEngine");

export interface TradingEngineDeps {
  config: Pick<TraderConfig, "symbol" | "quantity" | "recentTradesLimit">;
  feed: Pick<FeedConfig, "pollIntervalMs" | "errorBackoffMs" | "warmupBars">;
  policy: PolicyConfig;
  source: MarketDataSource;
  gateway: OrderGateway;
  alerts: AlertsClient;
  onCycle?: (status: Readonly<StatusSnapshot>) => void;
  onDecision?: (decision: Decision, candle: Candle) => void;
  onTrade?: (trade: Trade) => void;
  now?: () => number;
}

export interface CycleResult {
  outcome: FeedOutcome;
  decision: Decision | null;
  /** Set when the source still had closed candles queued behind this one. */
  backlog?: boolean;
}

function sideOf(signal: SignalType): PositionSide {
  return signal === "enter-long" || signal === "exit-long" ? "long" : "short";
}

/**
 * The single consumer task: pulls candles from the source, feeds the
 * indicator engine, asks the policy for a decision and drives the ledger.
 * Cycles run strictly one after another; readers only see frozen snapshots.
 */
export class TradingEngine {
  private deps: TradingEngineDeps;
  private now: () => number;
  private indicators: IndicatorEngine;
  private policy: SignalPolicy;
  private ledger: PositionLedger;
  private backoff: FeedBackoff;
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private warmedUp = false;
  private currentPrice: number | null = null;
  private lastSnapshot: IndicatorSnapshot | null = null;
  private lastDecision: Decision | null = null;

  constructor(deps: TradingEngineDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.indicators = new IndicatorEngine(deps.policy);
    this.policy = new SignalPolicy(deps.policy);
    this.ledger = new PositionLedger(deps.gateway, deps.config.quantity);
    this.backoff = new FeedBackoff({
      // sources that block inside next() need no extra pacing
      pollIntervalMs: deps.source.kind === "poll" ? deps.feed.pollIntervalMs : 0,
      errorBackoffMs: deps.feed.errorBackoffMs,
    });
  }

  /**
   * Starts the consumer task. False when it is already running. A start while
   * the previous task is still winding down queues the new run behind it.
   */
  start(): boolean {
    if (this.isRunning()) return false;
    const controller = new AbortController();
    this.controller = controller;
    const previous = this.task ?? Promise.resolve();
    log.info({ action: "start", symbol: this.deps.config.symbol, mode: this.deps.gateway.mode }, "Trading engine started");
    const task: Promise<void> = previous
      .then(() => this.run(controller.signal))
      .catch((err) => {
        log.error({ action: "run", err }, "Trading loop crashed");
      })
      .finally(() => {
        if (this.controller === controller) this.controller = null;
        if (this.task === task) this.task = null;
        log.info({ action: "stopped" }, "Trading engine stopped");
      });
    this.task = task;
    return true;
  }

  /** Requests a stop and returns at once. An in-flight order completes first. */
  stop(): boolean {
    if (!this.controller || this.controller.signal.aborted) return false;
    this.controller.abort();
    log.info({ action: "stop" }, "Trading engine stop requested");
    return true;
  }

  isRunning(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  /** Resolves once the consumer task has exited. */
  async whenStopped(): Promise<void> {
    await this.task;
  }

  async warmup(): Promise<number> {
    this.warmedUp = true;
    const bars = this.deps.feed.warmupBars;
    if (!this.deps.source.warmup || bars <= 0) return 0;
    try {
      const candles = await this.deps.source.warmup(bars);
      const accepted = this.indicators.warm(candles);
      const latest = this.indicators.latest();
      if (latest) this.currentPrice = latest.c;
      log.info({ action: "warmup", requested: bars, accepted }, "Indicator window warmed");
      return accepted;
    } catch (err) {
      log.error({ action: "warmup", err }, "Warmup failed, filling window from live candles");
      return 0;
    }
  }

  /** One `next → ingest → evaluate → transition` step. Never throws. */
  async runCycle(signal: AbortSignal): Promise<CycleResult> {
    let result: FeedResult;
    try {
      result = await this.deps.source.next(signal);
    } catch (err) {
      result = { kind: "error", error: feedError("transport", errorMessage(err)) };
    }

    if (result.kind === "timeout") return { outcome: "timeout", decision: null };
    if (result.kind === "error") {
      log.warn({ action: "feed", reason: result.error.reason, consecutiveErrors: this.backoff.getConsecutiveErrors() + 1 }, result.error.message);
      return { outcome: "error", decision: null };
    }

    try {
      const decision = await this.processCandle(result.candle, signal);
      return { outcome: "candle", decision, backlog: result.more };
    } catch (err) {
      log.error({ action: "processCandle", t: result.candle.t, err }, "Cycle failed");
      return { outcome: "error", decision: null };
    }
  }

  /**
   * Ingest one closed candle and act on the resulting decision. Decision time
   * is the candle's own timestamp. After `signal` aborts the candle is still
   * ingested but nothing is traded.
   */
  async processCandle(candle: Candle, signal?: AbortSignal): Promise<Decision | null> {
    const ingest = this.indicators.ingest(candle);
    if (ingest.status === "stale") {
      log.debug({ action: "ingest", t: candle.t, latestT: ingest.latestT }, "Stale candle dropped");
      return null;
    }

    this.currentPrice = candle.c;
    this.ledger.markPrice(candle.c);

    if (ingest.status === "insufficient") {
      log.debug({ action: "ingest", have: ingest.have, need: ingest.need }, "Waiting for indicator window");
      return null;
    }

    this.lastSnapshot = ingest.snapshot;
    if (signal?.aborted) return null;

    const decision = this.policy.evaluate(ingest.snapshot, this.ledger.getPositionState(), candle.t);
    this.lastDecision = decision;
    if (decision.signal === "none") {
      log.debug({ action: "evaluate", suppressed: decision.suppressed }, decision.reason);
      return decision;
    }

    log.info({ action: "evaluate", signal: decision.signal, close: candle.c, t: candle.t }, decision.reason);
    await this.execute(decision, candle);
    const { onDecision } = this.deps;
    if (onDecision) this.runHook("onDecision", () => onDecision(decision, candle));
    return decision;
  }

  getStatus(recentLimit: number = this.deps.config.recentTradesLimit): Readonly<StatusSnapshot> {
    const trades = this.ledger.getTrades();
    const performance = summarize(trades);
    const policyState = this.policy.getState();
    return deepFreeze({
      running: this.isRunning(),
      mode: this.deps.gateway.mode,
      symbol: this.deps.config.symbol,
      currentPrice: this.currentPrice,
      position: this.ledger.getPosition(),
      trades: this.ledger.getTrades(recentLimit),
      totalTrades: trades.length,
      totalPnl: this.ledger.getTotalPnl(),
      winRate: performance.winRate,
      performance,
      lastSignal: {
        side: policyState.lastSignalSide,
        time: policyState.lastSignalTime,
        decision: this.lastDecision ? { ...this.lastDecision } : null,
      },
      indicators: this.lastSnapshot ? { ...this.lastSnapshot } : null,
      feed: this.backoff.status(this.deps.source.kind),
      timestamp: new Date(this.now()).toISOString(),
    });
  }

  private async run(signal: AbortSignal): Promise<void> {
    if (!this.warmedUp) await this.warmup();

    while (!signal.aborted) {
      const { outcome, backlog } = await this.runCycle(signal);
      const delayMs = this.backoff.record(outcome, this.now(), backlog);
      const { onCycle } = this.deps;
      if (onCycle) this.runHook("onCycle", () => onCycle(this.getStatus()));
      if (!(await abortableSleep(delayMs, signal))) break;
    }
  }

  private async execute(decision: Decision, candle: Candle): Promise<void> {
    const side = sideOf(decision.signal);
    const ctx = { symbol: this.deps.config.symbol, mode: this.deps.gateway.mode };

    if (isEntry(decision.signal)) {
      const opened = await this.ledger.open(side, candle.c, candle.t, decision.reason);
      if (!opened.ok) return;
      this.policy.commit(decision.signal, candle.t);
      this.deps.alerts.notifyPositionOpened(opened.value, ctx).catch((err) => {
        log.warn({ action: "notifyPositionOpened", err }, "Open notification failed");
      });
      return;
    }

    const closed = await this.ledger.close(side, candle.c, candle.t, decision.reason);
    if (!closed.ok) return;
    this.policy.commit(decision.signal, candle.t);
    const { onTrade } = this.deps;
    if (onTrade) this.runHook("onTrade", () => onTrade(closed.value));
    this.deps.alerts
      .notifyPositionClosed(closed.value, { ...ctx, totalPnl: this.ledger.getTotalPnl() })
      .catch((err) => {
        log.warn({ action: "notifyPositionClosed", err }, "Close notification failed");
      });
  }

  /** Observer hooks never affect trading; a throw is logged and dropped. */
  private runHook(name: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      log.warn({ action: name, err }, "Observer hook failed");
    }
  }
}
