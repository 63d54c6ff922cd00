// Types
export type { Candle } from "./types/candle.js";
export { CandleSchema, CandleInterval, intervalToMs, isValidCandle } from "./types/candle.js";
export type {
  BreakoutDirection,
  BreakoutResult,
  TraumaResult,
  IndicatorSnapshot,
  IngestResult,
} from "./types/indicators.js";
export type {
  PositionSide,
  PositionState,
  SignalType,
  Decision,
  PolicyConfig,
  PolicyConfigInput,
} from "./types/policy.js";
export { PolicyConfigSchema, PolicyConfigFieldsSchema } from "./types/policy.js";

// Indicators
export { rsiSimple } from "./indicators/rsi.js";
export { smaLast } from "./indicators/sma.js";
export { trueRange, averageTrueRange } from "./indicators/true-range.js";
export { traumaLine, TRAUMA_ATR_FACTOR } from "./indicators/trauma.js";
export { detectBreakout, DEFAULT_VOLUME_SURGE } from "./indicators/breakout.js";

// Engine
export { PriceWindow } from "./engine/price-window.js";
export type { PushOutcome } from "./engine/price-window.js";
export { IndicatorEngine, DEFAULT_INDICATOR_CONFIG } from "./engine/indicator-engine.js";
export type { IndicatorEngineConfig } from "./engine/indicator-engine.js";

// Policy
export { SignalPolicy, isEntry, isExit } from "./policy/signal-policy.js";
export type { PolicyThresholds, SignalPolicyState } from "./policy/signal-policy.js";

// Strategies
export { resolvePolicyConfig, STRATEGY_PRESETS } from "./strategies/presets.js";
export type { StrategyPreset } from "./strategies/presets.js";
