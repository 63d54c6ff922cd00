export type BreakoutDirection = "up" | "down" | "none";

export interface BreakoutResult {
  direction: BreakoutDirection;
  /** Highest high of the lookback window excluding the current candle. */
  resistance: number | null;
  /** Lowest low of the lookback window excluding the current candle. */
  support: number | null;
  avgVolume: number | null;
}

export interface TraumaResult {
  sma: number;
  atr: number;
  trauma: number;
}

export interface IndicatorSnapshot {
  t: number;
  close: number;
  volume: number;
  rsi: number;
  sma: number;
  atr: number;
  trauma: number;
  breakout: BreakoutDirection;
  resistance: number | null;
  support: number | null;
  avgVolume: number | null;
}

export type IngestResult =
  | { status: "ready"; snapshot: IndicatorSnapshot }
  | { status: "insufficient"; have: number; need: number }
  | { status: "stale"; latestT: number };
