import { readFileSync } from "node:fs";
import { formatZodErrors } from "@candle-trader/kit";
import { TraderConfigSchema, type TraderConfig } from "../types/config.js";

export function parseConfig(raw: unknown): TraderConfig {
  const parsed = TraderConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid trader config: ${formatZodErrors(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

export function loadConfig(path: string): TraderConfig {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseConfig(raw);
}
