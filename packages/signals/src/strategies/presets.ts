import { PolicyConfigSchema, type PolicyConfig, type PolicyConfigInput } from "../types/policy.js";

export const STRATEGY_PRESETS = ["trauma-breakout", "conservative", "scalp"] as const;
export type StrategyPreset = (typeof STRATEGY_PRESETS)[number];

const PRESET_OVERRIDES: Record<StrategyPreset, PolicyConfigInput> = {
  // Defaults: RSI 14, trauma 20, 20-bar breakout on 1.2x volume, 5 min between entries
  "trauma-breakout": {},
  conservative: {
    overbought: 75,
    oversold: 25,
    traumaPeriod: 30,
    breakoutLookback: 30,
    volumeSurge: 1.5,
    minSignalIntervalMs: 900_000,
  },
  scalp: {
    rsiPeriod: 7,
    overbought: 65,
    oversold: 35,
    traumaPeriod: 10,
    breakoutLookback: 10,
    minSignalIntervalMs: 60_000,
    windowSize: 50,
  },
};

/**
 * Policy config for a named preset, with optional per-field overrides.
 * Throws a ZodError when the merged config is inconsistent.
 */
export function resolvePolicyConfig(
  preset: StrategyPreset = "trauma-breakout",
  overrides: PolicyConfigInput = {},
): PolicyConfig {
  return PolicyConfigSchema.parse({ ...PRESET_OVERRIDES[preset], ...overrides });
}
