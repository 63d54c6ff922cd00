import type { z } from "zod";

/** One `path: message` line per issue; root-level issues carry no path prefix. */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}
