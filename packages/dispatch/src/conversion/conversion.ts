import type { Insight } from "../insight.js";
import type { TypeOfArgument } from "../type-registry.js";
import { createWeight, type Weight, type WeightInput } from "../weight.js";

/** A single priced step between two types. */
export type Conversion = {
  readonly source: TypeOfArgument;
  readonly target: TypeOfArgument;
  weight: (insight: Insight) => Weight;
  apply: (value: unknown) => unknown;
};

export type ConversionInput = {
  source: TypeOfArgument;
  target: TypeOfArgument;
  /** Fixed cost, or a cost that depends on the argument's insight. */
  weight: WeightInput | ((insight: Insight) => Weight);
  apply?: (value: unknown) => unknown;
};

const identity = (value: unknown): unknown => value;

export const createConversion = ({
  source,
  target,
  weight,
  apply = identity,
}: ConversionInput): Conversion => {
  if (typeof weight === "function") {
    return { source, target, weight, apply };
  }
  const fixed = createWeight(weight);
  return { source, target, weight: () => fixed, apply };
};
