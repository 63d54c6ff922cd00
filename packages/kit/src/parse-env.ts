import type { z } from "zod";

export function parseEnv<T extends z.ZodTypeAny>(schema: T, source: NodeJS.ProcessEnv = process.env): z.output<T> {
  return schema.parse(source);
}
