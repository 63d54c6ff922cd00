import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

describe("formatZodErrors", () => {
  it("prefixes each issue with its dotted path", () => {
    const schema = z.object({ feed: z.object({ pollIntervalMs: z.number().positive() }), symbol: z.string() });
    const result = schema.safeParse({ feed: { pollIntervalMs: -1 }, symbol: 7 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual([
        "feed.pollIntervalMs: Number must be greater than 0",
        "symbol: Expected string, received number",
      ]);
    }
  });

  it("leaves root-level issues unprefixed", () => {
    const result = z.number().safeParse("x");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["Expected number, received string"]);
    }
  });
});
