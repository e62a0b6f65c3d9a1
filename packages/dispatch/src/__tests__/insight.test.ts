import { describe, expect, it } from "vitest";
import {
  compareInsights,
  formatInsight,
  hashInsight,
  insightsEqual,
} from "../insight.js";

describe("insights", () => {
  it("orders null before numbers before strings", () => {
    const sorted = ["char", 32, null, 8, "ascii", Number.NaN].sort(compareInsights);
    expect(sorted).toEqual([null, 8, 32, Number.NaN, "ascii", "char"]);
  });

  it("compares by value", () => {
    expect(insightsEqual(16, 16)).toBe(true);
    expect(insightsEqual(0, -0)).toBe(true);
    expect(insightsEqual(Number.NaN, Number.NaN)).toBe(true);
    expect(insightsEqual("16", 16)).toBe(false);
    expect(insightsEqual(null, 0)).toBe(false);
  });

  it("hashes equal insights alike", () => {
    expect(hashInsight(0)).toBe(hashInsight(-0));
    expect(hashInsight("char")).toBe(hashInsight("char"));
    expect(hashInsight("8")).not.toBe(hashInsight(8));
  });

  it("formats insights for trace output", () => {
    expect(formatInsight(null)).toBe("-");
    expect(formatInsight(53)).toBe("53");
    expect(formatInsight("char")).toBe('"char"');
  });
});
