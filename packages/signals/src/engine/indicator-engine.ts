import type { Candle } from "../types/candle.js";
import type { IndicatorSnapshot, IngestResult } from "../types/indicators.js";
import { rsiSimple } from "../indicators/rsi.js";
import { traumaLine } from "../indicators/trauma.js";
import { detectBreakout, DEFAULT_VOLUME_SURGE } from "../indicators/breakout.js";
import { PriceWindow } from "./price-window.js";

export interface IndicatorEngineConfig {
  windowSize: number;
  rsiPeriod: number;
  traumaPeriod: number;
  breakoutLookback: number;
  volumeSurge?: number;
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorEngineConfig = {
  windowSize: 100,
  rsiPeriod: 14,
  traumaPeriod: 20,
  breakoutLookback: 20,
  volumeSurge: DEFAULT_VOLUME_SURGE,
};

export class IndicatorEngine {
  private config: IndicatorEngineConfig;
  private window: PriceWindow;

  constructor(config: Partial<IndicatorEngineConfig> = {}) {
    this.config = { ...DEFAULT_INDICATOR_CONFIG, ...config };
    this.window = new PriceWindow(this.config.windowSize);
  }

  /** Candles needed before a snapshot is produced. */
  requiredBars(): number {
    return Math.max(this.config.rsiPeriod, this.config.traumaPeriod) + 1;
  }

  ingest(candle: Candle): IngestResult {
    const outcome = this.window.push(candle);
    if (outcome === "stale") {
      return { status: "stale", latestT: this.window.latest()?.t ?? candle.t };
    }

    const need = this.requiredBars();
    const have = this.window.size();
    if (have < need) return { status: "insufficient", have, need };

    return { status: "ready", snapshot: this.snapshot() };
  }

  /** Fill the window from history without producing decisions. */
  warm(candles: Candle[]): number {
    let accepted = 0;
    for (const candle of candles) {
      if (this.window.push(candle) !== "stale") accepted++;
    }
    return accepted;
  }

  /**
   * Indicators for the current window. With an empty window the trauma line
   * and SMA fall back to `fallback`.
   */
  snapshot(fallback: number = NaN): IndicatorSnapshot {
    const candles = [...this.window.toArray()];
    const latest = candles.length > 0 ? candles[candles.length - 1] : null;
    const closes = candles.map((c) => c.c);

    const { sma, atr, trauma } = traumaLine(candles, this.config.traumaPeriod, latest?.c ?? fallback);
    const breakout = detectBreakout(candles, this.config.breakoutLookback, this.config.volumeSurge);

    return {
      t: latest?.t ?? 0,
      close: latest?.c ?? fallback,
      volume: latest?.v ?? 0,
      rsi: rsiSimple(closes, this.config.rsiPeriod),
      sma,
      atr,
      trauma,
      breakout: breakout.direction,
      resistance: breakout.resistance,
      support: breakout.support,
      avgVolume: breakout.avgVolume,
    };
  }

  getWindow(): readonly Candle[] {
    return this.window.toArray();
  }

  latest(): Candle | null {
    return this.window.latest();
  }

  size(): number {
    return this.window.size();
  }

  reset(): void {
    this.window.clear();
  }
}
