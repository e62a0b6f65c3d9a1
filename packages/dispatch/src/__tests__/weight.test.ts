import { describe, expect, it } from "vitest";
import {
  INFINITE_WEIGHT,
  ZERO_WEIGHT,
  addWeights,
  allPossible,
  compareWeights,
  createWeight,
  formatWeight,
  isPossible,
  weightLessThan,
} from "../weight.js";

describe("weights", () => {
  it("orders components from user-defined down to epsilon", () => {
    const promotions = createWeight({ promotion: 50, epsilon: 9 });
    const upcast = createWeight({ upcast: 1 });
    const userDefined = createWeight({ userDefined: 1 });

    expect(compareWeights(promotions, upcast)).toBe(-1);
    expect(compareWeights(userDefined, upcast)).toBe(1);
    expect(compareWeights(createWeight({ epsilon: 2 }), createWeight({ epsilon: 2 }))).toBe(0);
    expect(weightLessThan(ZERO_WEIGHT, createWeight({ epsilon: 1 }))).toBe(true);
  });

  it("treats any infinite component as impossible", () => {
    expect(isPossible(ZERO_WEIGHT)).toBe(true);
    expect(isPossible(INFINITE_WEIGHT)).toBe(false);
    expect(isPossible(createWeight({ epsilon: Number.POSITIVE_INFINITY }))).toBe(false);
    expect(allPossible([ZERO_WEIGHT, INFINITE_WEIGHT])).toBe(false);
    expect(allPossible([])).toBe(true);
  });

  it("ranks every finite weight below the infinite weight", () => {
    const heavy = createWeight({ userDefined: 1e9, upcast: 1e9 });
    expect(weightLessThan(heavy, INFINITE_WEIGHT)).toBe(true);
    expect(compareWeights(INFINITE_WEIGHT, INFINITE_WEIGHT)).toBe(0);
  });

  it("adds component-wise and lets impossibility absorb", () => {
    const sum = addWeights(
      createWeight({ upcast: 1, promotion: 2 }),
      createWeight({ promotion: 1, epsilon: 4 })
    );
    expect(sum).toEqual({ userDefined: 0, upcast: 1, promotion: 3, epsilon: 4 });
    expect(addWeights(sum, INFINITE_WEIGHT)).toBe(INFINITE_WEIGHT);
  });

  it("formats possible and impossible weights", () => {
    expect(formatWeight(createWeight({ upcast: 1, epsilon: 2 }))).toBe("(0, 1, 0, 2)");
    expect(formatWeight(INFINITE_WEIGHT)).toBe("(∞)");
  });
});
