import { describe, expect, it } from "vitest";
import { compareAlternatives, routeWeights } from "../compare.js";
import { createConversion } from "../conversion/conversion.js";
import { createConversionRoute, identityRoute } from "../conversion/route.js";
import { TypeRegistry } from "../type-registry.js";
import { INFINITE_WEIGHT, ZERO_WEIGHT, createWeight, type WeightInput } from "../weight.js";

const registry = new TypeRegistry();
const int = registry.intern("int");
const long = registry.intern("long");

const routeCosting = (weight: WeightInput) =>
  createConversionRoute({
    source: int,
    target: long,
    steps: [createConversion({ source: int, target: long, weight })],
  });

describe("compareAlternatives", () => {
  it("is better when it wins somewhere and loses nowhere", () => {
    const known = [createWeight({ promotion: 1 }), ZERO_WEIGHT];
    expect(
      compareAlternatives(known, [identityRoute(int), identityRoute(int)], [null, null])
    ).toBe("better");
  });

  it("is worse when it loses somewhere and wins nowhere", () => {
    expect(
      compareAlternatives([ZERO_WEIGHT], [routeCosting({ epsilon: 1 })], [null])
    ).toBe("worse");
  });

  it("is ambiguous when it both wins and loses", () => {
    const known = [ZERO_WEIGHT, createWeight({ upcast: 1 })];
    const suggested = [routeCosting({ promotion: 1 }), identityRoute(int)];
    expect(compareAlternatives(known, suggested, [null, null])).toBe("ambiguous");
  });

  it("is equivalent when every position ties", () => {
    expect(
      compareAlternatives(
        [createWeight({ promotion: 2 })],
        [routeCosting({ promotion: 2 })],
        [null]
      )
    ).toBe("equivalent");
  });

  it("treats any candidate as better for zero arguments", () => {
    expect(compareAlternatives([], [], [])).toBe("better");
  });

  it("prices each route with the insight at its position", () => {
    const widthSensitive = createConversionRoute({
      source: int,
      target: long,
      steps: [
        createConversion({
          source: int,
          target: long,
          weight: (insight) =>
            insight === 8 ? createWeight({ promotion: 1 }) : INFINITE_WEIGHT,
        }),
      ],
    });
    expect(routeWeights([widthSensitive, widthSensitive], [8, 64])).toEqual([
      createWeight({ promotion: 1 }),
      INFINITE_WEIGHT,
    ]);
    expect(compareAlternatives([INFINITE_WEIGHT], [widthSensitive], [8])).toBe(
      "better"
    );
  });

  it("rejects mismatched lengths", () => {
    expect(() =>
      compareAlternatives([ZERO_WEIGHT], [], [])
    ).toThrow("cannot compare 0 route(s) against 1 weight(s)");
  });
});
