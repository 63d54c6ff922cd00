import { z } from "zod";

export type PositionSide = "long" | "short";
export type PositionState = "flat" | PositionSide;

export type SignalType = "none" | "enter-long" | "enter-short" | "exit-long" | "exit-short";

export interface Decision {
  signal: SignalType;
  reason: string;
  /** True when a qualifying signal was dropped by the minimum-interval debounce. */
  suppressed: boolean;
}

export const PolicyConfigFieldsSchema = z.object({
  windowSize: z.number().int().positive().default(100),
  rsiPeriod: z.number().int().positive().default(14),
  overbought: z.number().min(0).max(100).default(70),
  oversold: z.number().min(0).max(100).default(30),
  traumaPeriod: z.number().int().positive().default(20),
  breakoutLookback: z.number().int().min(2).default(20),
  volumeSurge: z.number().positive().default(1.2),
  minSignalIntervalMs: z.number().int().nonnegative().default(300_000),
  // Exits bypass the debounce unless this is set
  debounceExits: z.boolean().default(false),
});

export const PolicyConfigSchema = PolicyConfigFieldsSchema.superRefine((cfg, ctx) => {
  const need = Math.max(cfg.rsiPeriod, cfg.traumaPeriod) + 1;
  if (cfg.windowSize < need) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["windowSize"],
      message: `windowSize ${cfg.windowSize} cannot hold the ${need} candles the indicators need`,
    });
  }
  if (cfg.windowSize < cfg.breakoutLookback) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["breakoutLookback"],
      message: `breakoutLookback ${cfg.breakoutLookback} exceeds windowSize ${cfg.windowSize}`,
    });
  }
  if (cfg.oversold >= cfg.overbought) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["oversold"],
      message: "oversold must be below overbought",
    });
  }
});

export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type PolicyConfigInput = z.input<typeof PolicyConfigSchema>;
