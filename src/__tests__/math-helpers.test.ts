import { describe, expect, it } from "vitest";
import { clamp01 } from "../utils/math-helpers.ts";

describe("clamp01", () => {
  it("clamps below 0", () => expect(clamp01(-0.5)).toBe(0));
  it("clamps above 1", () => expect(clamp01(1.2)).toBe(1));
  it("keeps the edges", () => {
    expect(clamp01(0)).toBe(0);
    expect(clamp01(1)).toBe(1);
  });
  it("passes through values in range", () => expect(clamp01(0.4)).toBe(0.4));
});
