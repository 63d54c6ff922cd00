import { z } from "zod";
import { parseEnv } from "@candle-trader/kit";
import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

// dotenv yields "" for a key left blank, which counts as unset
const optionalSecret = z.preprocess((v) => (v === "" ? undefined : v), z.string().min(1).optional());

export const EnvSchema = z.object({
  KRAKEN_API_KEY: optionalSecret,
  KRAKEN_API_SECRET: optionalSecret,
  PORT: z.coerce.number().int().positive().optional(),
  AUTO_START: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase() === "true"),
});

export type Env = z.infer<typeof EnvSchema>;

export interface LiveCredentials {
  apiKey: string;
  secret: string;
}

/** Load the package's .env (if any) into process.env and return the parsed subset. */
export function loadEnv(source?: Record<string, string | undefined>): Env {
  if (!source) {
    dotenv.config({ path: join(__dirname, "../../.env") });
  }
  return parseEnv(EnvSchema, source ?? process.env);
}

export function requireLiveCredentials(env: Env): LiveCredentials {
  if (!env.KRAKEN_API_KEY || !env.KRAKEN_API_SECRET) {
    throw new Error("live mode requires KRAKEN_API_KEY and KRAKEN_API_SECRET");
  }
  return { apiKey: env.KRAKEN_API_KEY, secret: env.KRAKEN_API_SECRET };
}
