import type { IndicatorSnapshot } from "../types/indicators.js";
import type { Decision, PolicyConfig, PositionState, SignalType } from "../types/policy.js";

export type PolicyThresholds = Pick<
  PolicyConfig,
  "overbought" | "oversold" | "minSignalIntervalMs" | "debounceExits"
>;

export interface SignalPolicyState {
  lastSignalSide: "none" | "long" | "short";
  lastSignalTime: number | null;
}

function fmt(n: number | null): string {
  return n === null ? "n/a" : n.toFixed(2);
}

export function isEntry(signal: SignalType): signal is "enter-long" | "enter-short" {
  return signal === "enter-long" || signal === "enter-short";
}

export function isExit(signal: SignalType): signal is "exit-long" | "exit-short" {
  return signal === "exit-long" || signal === "exit-short";
}

/**
 * Turns an indicator snapshot and the current position state into at most one
 * signal. Entries are debounced by `minSignalIntervalMs` since the last
 * committed entry; exits are debounced only when `debounceExits` is set.
 *
 * `evaluate` has no side effects. The caller commits a signal once the
 * matching ledger transition has gone through.
 */
export class SignalPolicy {
  private config: PolicyThresholds;
  private lastSignalSide: SignalPolicyState["lastSignalSide"] = "none";
  private lastSignalTime: number | null = null;

  constructor(config: PolicyThresholds) {
    this.config = config;
  }

  evaluate(snapshot: IndicatorSnapshot, position: PositionState, now: number): Decision {
    const candidate = this.classify(snapshot, position);
    if (candidate.signal === "none") return candidate;

    const debounced = isEntry(candidate.signal) || this.config.debounceExits;
    const remainingMs = this.debounceRemaining(now);
    if (debounced && remainingMs > 0) {
      return {
        signal: "none",
        reason: `${candidate.signal} suppressed: ${Math.ceil(remainingMs / 1000)}s left of ${this.config.minSignalIntervalMs / 1000}s signal interval`,
        suppressed: true,
      };
    }
    return candidate;
  }

  commit(signal: SignalType, now: number): void {
    if (isEntry(signal)) {
      this.lastSignalSide = signal === "enter-long" ? "long" : "short";
      this.lastSignalTime = now;
    } else if (isExit(signal)) {
      this.lastSignalSide = "none";
      this.lastSignalTime = null;
    }
  }

  getState(): SignalPolicyState {
    return { lastSignalSide: this.lastSignalSide, lastSignalTime: this.lastSignalTime };
  }

  reset(): void {
    this.lastSignalSide = "none";
    this.lastSignalTime = null;
  }

  private debounceRemaining(now: number): number {
    if (this.lastSignalTime === null) return 0;
    return this.config.minSignalIntervalMs - (now - this.lastSignalTime);
  }

  private classify(s: IndicatorSnapshot, position: PositionState): Decision {
    if (position === "flat") {
      if (s.close > s.trauma && s.breakout === "up") {
        return {
          signal: "enter-long",
          reason: `Close ${fmt(s.close)} > trauma ${fmt(s.trauma)}, breakout above ${fmt(s.resistance)} on volume ${fmt(s.volume)} (avg ${fmt(s.avgVolume)})`,
          suppressed: false,
        };
      }
      if (s.close < s.trauma && s.breakout === "down") {
        return {
          signal: "enter-short",
          reason: `Close ${fmt(s.close)} < trauma ${fmt(s.trauma)}, breakdown below ${fmt(s.support)} on volume ${fmt(s.volume)} (avg ${fmt(s.avgVolume)})`,
          suppressed: false,
        };
      }
      return { signal: "none", reason: `No entry. Close ${fmt(s.close)}, trauma ${fmt(s.trauma)}, breakout ${s.breakout}`, suppressed: false };
    }

    if (position === "long" && s.rsi > this.config.overbought) {
      return { signal: "exit-long", reason: `RSI overbought: ${s.rsi.toFixed(1)}`, suppressed: false };
    }
    if (position === "short" && s.rsi < this.config.oversold) {
      return { signal: "exit-short", reason: `RSI oversold: ${s.rsi.toFixed(1)}`, suppressed: false };
    }
    return { signal: "none", reason: `Hold ${position}. RSI: ${s.rsi.toFixed(1)}`, suppressed: false };
  }
}
