import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { resolvePolicyConfig } from "./presets.js";

describe("resolvePolicyConfig", () => {
  it("returns the defaults for the trauma-breakout preset", () => {
    expect(resolvePolicyConfig()).toEqual({
      windowSize: 100,
      rsiPeriod: 14,
      overbought: 70,
      oversold: 30,
      traumaPeriod: 20,
      breakoutLookback: 20,
      volumeSurge: 1.2,
      minSignalIntervalMs: 300_000,
      debounceExits: false,
    });
  });

  it("applies preset values", () => {
    const cfg = resolvePolicyConfig("scalp");
    expect(cfg.rsiPeriod).toBe(7);
    expect(cfg.windowSize).toBe(50);
    expect(cfg.minSignalIntervalMs).toBe(60_000);
  });

  it("lets overrides win over the preset", () => {
    const cfg = resolvePolicyConfig("conservative", { overbought: 80, debounceExits: true });
    expect(cfg.overbought).toBe(80);
    expect(cfg.oversold).toBe(25);
    expect(cfg.debounceExits).toBe(true);
  });

  it("rejects a window too small for the indicators", () => {
    expect(() => resolvePolicyConfig("trauma-breakout", { windowSize: 15 })).toThrow(ZodError);
  });

  it("rejects inverted RSI thresholds", () => {
    expect(() => resolvePolicyConfig("trauma-breakout", { overbought: 30, oversold: 70 })).toThrow(/oversold must be below overbought/);
  });
});
