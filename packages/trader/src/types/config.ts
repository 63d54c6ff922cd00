import { z } from "zod";
import { CandleInterval, PolicyConfigFieldsSchema, STRATEGY_PRESETS } from "@candle-trader/signals";

export const FeedConfigSchema = z.object({
  kind: z.enum(["poll", "stream"]).default("poll"),
  pollIntervalMs: z.number().int().positive().default(60_000),
  errorBackoffMs: z.number().int().positive().default(30_000),
  // 0 skips warmup; the window then fills from live candles
  warmupBars: z.number().int().nonnegative().default(100),
});

export const TraderConfigSchema = z.object({
  mode: z.enum(["sandbox", "live"]).default("sandbox"),
  exchange: z.string().min(1).default("kraken"),
  symbol: z.string().min(1).default("BTC/USD"),
  interval: z.enum(CandleInterval).default("1m"),
  quantity: z.number().positive().default(0.01),
  port: z.number().int().positive().default(8000),
  autoStart: z.boolean().default(false),
  gatewayUrl: z.string().url().optional(),
  feed: FeedConfigSchema.default({}),
  strategy: z.enum(STRATEGY_PRESETS).default("trauma-breakout"),
  policy: PolicyConfigFieldsSchema.partial().default({}),
  recentTradesLimit: z.number().int().positive().default(10),
  logLevels: z.record(z.string()).default({}),
});

export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type TraderConfig = z.infer<typeof TraderConfigSchema>;
export type TraderMode = TraderConfig["mode"];
