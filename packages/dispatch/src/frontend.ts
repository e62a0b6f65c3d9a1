import type { Insight } from "./insight.js";
import type { TypeOfArgument } from "./type-registry.js";

/**
 * Classifies the values a scripting frontend passes in. `detectType` must
 * return the same interned descriptor for every value of one logical type.
 */
export type TypeDetector = {
  detectType: (value: unknown) => TypeOfArgument;
  detectInsight: (value: unknown) => Insight;
};
