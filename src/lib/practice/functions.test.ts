import { describe, expect, it } from "vitest";
import { double, DOUBLE_INPUT } from "@/lib/practice/functions";

describe("double", () => {
  it("doubles 2 to 4", () => {
    expect(double(DOUBLE_INPUT)).toBe(4);
  });

  it("handles zero and negatives", () => {
    expect(double(0)).toBe(0);
    expect(double(-7)).toBe(-14);
  });
});
