import type { CallScope } from "../call-scope.js";
import type { Insight } from "../insight.js";
import type { TypeOfArgument } from "../type-registry.js";
import { addWeights, ZERO_WEIGHT, type Weight } from "../weight.js";
import type { Conversion } from "./conversion.js";

/**
 * Chain of conversions from an actual argument's type to a formal
 * parameter's type. An empty chain is the zero-cost identity route.
 */
export type ConversionRoute = {
  readonly source: TypeOfArgument;
  readonly target: TypeOfArgument;
  readonly steps: readonly Conversion[];
  totalWeight: (insight: Insight) => Weight;
  apply: (value: unknown, scope: CallScope) => unknown;
};

export const createConversionRoute = ({
  source,
  target,
  steps,
}: {
  source: TypeOfArgument;
  target: TypeOfArgument;
  steps: readonly Conversion[];
}): ConversionRoute => {
  steps.forEach((step, index) => {
    const expected = index === 0 ? source : steps[index - 1].target;
    if (step.source !== expected) {
      throw new Error(
        `conversion step ${index} starts at ${step.source.name}, expected ${expected.name}`
      );
    }
  });
  const last = steps.at(-1);
  if ((last?.target ?? source) !== target) {
    throw new Error(
      `conversion route from ${source.name} does not end at ${target.name}`
    );
  }

  const frozen = Object.freeze([...steps]);
  return {
    source,
    target,
    steps: frozen,
    // The insight describes the original value and is given to every step.
    totalWeight: (insight) =>
      frozen.reduce(
        (total, step) => addWeights(total, step.weight(insight)),
        ZERO_WEIGHT
      ),
    apply: (value, scope) =>
      frozen.reduce((current, step) => {
        const next = step.apply(current);
        return next === current ? current : scope.adopt(next);
      }, value),
  };
};

export const identityRoute = (type: TypeOfArgument): ConversionRoute =>
  createConversionRoute({ source: type, target: type, steps: [] });

export const formatRoute = (route: ConversionRoute): string =>
  [route.source, ...route.steps.map((step) => step.target)]
    .map((type) => type.name)
    .join(" -> ");
