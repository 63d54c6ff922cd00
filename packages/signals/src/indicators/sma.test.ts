import { describe, it, expect } from "vitest";
import { smaLast } from "./sma.js";

describe("smaLast", () => {
  it("returns the fallback for empty input", () => {
    expect(smaLast([], 20, 42)).toBe(42);
    expect(smaLast([], 20)).toBeNaN();
  });

  it("throws on period < 1", () => {
    expect(() => smaLast([1], 0)).toThrow();
  });

  it("averages the trailing period only", () => {
    expect(smaLast([100, 1, 2, 3], 3)).toBeCloseTo(2, 10);
  });

  it("averages what exists when shorter than the period", () => {
    expect(smaLast([4, 6], 20)).toBeCloseTo(5, 10);
  });

  it("returns the single value for a one-element series", () => {
    expect(smaLast([117.5], 20)).toBeCloseTo(117.5, 10);
  });
});
