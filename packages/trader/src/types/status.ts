import type { Decision, IndicatorSnapshot } from "@candle-trader/signals";
import type { PerformanceSummary, Position, Trade } from "./ledger.js";
import type { TraderMode } from "./config.js";

export interface FeedStatus {
  kind: "poll" | "stream" | "replay";
  lastCandleAt: number | null;
  lastErrorAt: number | null;
  consecutiveErrors: number;
  backoffMs: number;
}

export interface StatusSnapshot {
  running: boolean;
  mode: TraderMode;
  symbol: string;
  currentPrice: number | null;
  position: Position | null;
  trades: Trade[];
  totalTrades: number;
  totalPnl: number;
  winRate: number;
  performance: PerformanceSummary;
  lastSignal: {
    side: "none" | "long" | "short";
    time: number | null;
    decision: Decision | null;
  };
  indicators: IndicatorSnapshot | null;
  feed: FeedStatus;
  timestamp: string;
}
