import type { PositionSide } from "@candle-trader/signals";

export type LedgerState = "FLAT" | "LONG" | "SHORT";

export interface Position {
  side: PositionSide;
  entryPrice: number;
  /** Candle timestamp (ms) the position was opened on. */
  entryTime: number;
  quantity: number;
  orderId: string;
  reason: string;
  currentPrice: number;
  unrealizedPnl: number;
}

export interface Trade {
  readonly side: PositionSide;
  readonly entryTime: number;
  readonly exitTime: number;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  readonly pnl: number;
  /** Why the position was closed. */
  readonly reason: string;
  readonly entryReason: string;
  readonly entryOrderId: string;
  readonly exitOrderId: string;
}

export interface PerformanceSummary {
  tradeCount: number;
  winCount: number;
  lossCount: number;
  /** winCount / tradeCount, 0 when there are no trades. */
  winRate: number;
  totalPnl: number;
  averagePnl: number | null;
  bestPnl: number | null;
  worstPnl: number | null;
}
