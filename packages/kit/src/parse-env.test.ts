import { describe, it, expect } from "vitest";
import { z } from "zod";
import { parseEnv } from "./parse-env.js";

describe("parseEnv", () => {
  it("parses env vars matching the schema", () => {
    const schema = z.object({ PORT: z.coerce.number() });
    expect(parseEnv(schema, { PORT: "8080" }).PORT).toBe(8080);
  });

  it("applies defaults from the schema", () => {
    const schema = z.object({ AUTO_START: z.string().default("false") });
    expect(parseEnv(schema, {}).AUTO_START).toBe("false");
  });

  it("throws on invalid env", () => {
    const schema = z.object({ KRAKEN_API_KEY: z.string().min(1) });
    expect(() => parseEnv(schema, {})).toThrow();
  });
});
