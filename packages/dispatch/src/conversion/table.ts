import type { Insight } from "../insight.js";
import type { TypeOfArgument } from "../type-registry.js";
import {
  addWeights,
  isPossible,
  weightLessThan,
  ZERO_WEIGHT,
  type Weight,
} from "../weight.js";
import {
  createConversion,
  type Conversion,
  type ConversionInput,
} from "./conversion.js";
import {
  createConversionRoute,
  identityRoute,
  type ConversionRoute,
} from "./route.js";
import type {
  ConversionRouter,
  RouteResult,
  SequenceRouteResult,
} from "./router.js";

type Frontier = {
  weight: Weight;
  steps: Conversion[];
};

/**
 * Conversion graph over interned types. Routes are the cheapest paths under
 * the weight order, computed per insight since edge costs may depend on it.
 */
export class ConversionTable implements ConversionRouter {
  #outgoing = new Map<TypeOfArgument, Conversion[]>();
  #edgeConversions = new Map<TypeOfArgument, Conversion>();

  registerConversion(input: ConversionInput): Conversion {
    if (input.source === input.target) {
      throw new Error(
        `conversion from ${input.source.name} to itself is implicit`
      );
    }
    const conversion = createConversion(input);
    const bucket = this.#outgoing.get(conversion.source) ?? [];
    bucket.push(conversion);
    this.#outgoing.set(conversion.source, bucket);
    return conversion;
  }

  registerEdgeConversion(input: ConversionInput): Conversion {
    const conversion = createConversion(input);
    this.#edgeConversions.set(conversion.source, conversion);
    return conversion;
  }

  conversionsFrom(type: TypeOfArgument): readonly Conversion[] {
    return this.#outgoing.get(type) ?? [];
  }

  edgeConversion(type: TypeOfArgument): Conversion | undefined {
    return this.#edgeConversions.get(type);
  }

  bestRoute(
    source: TypeOfArgument,
    insight: Insight,
    target: TypeOfArgument
  ): RouteResult {
    if (source === target) {
      return { kind: "route", route: identityRoute(source) };
    }

    const frontier = new Map<TypeOfArgument, Frontier>([
      [source, { weight: ZERO_WEIGHT, steps: [] }],
    ]);
    const settled = new Set<TypeOfArgument>();

    // eslint-disable-next-line no-constant-condition
    while (true) {
      let current: TypeOfArgument | undefined;
      let currentEntry: Frontier | undefined;
      for (const [type, entry] of frontier) {
        if (settled.has(type)) continue;
        if (!currentEntry || weightLessThan(entry.weight, currentEntry.weight)) {
          current = type;
          currentEntry = entry;
        }
      }

      if (!current || !currentEntry) {
        return { kind: "no-route" };
      }
      if (current === target) {
        return {
          kind: "route",
          route: createConversionRoute({
            source,
            target,
            steps: currentEntry.steps,
          }),
        };
      }

      settled.add(current);
      const reached = currentEntry;
      this.conversionsFrom(current).forEach((conversion) => {
        if (settled.has(conversion.target)) return;
        const stepWeight = conversion.weight(insight);
        if (!isPossible(stepWeight)) return;
        const weight = addWeights(reached.weight, stepWeight);
        const known = frontier.get(conversion.target);
        if (!known || weightLessThan(weight, known.weight)) {
          frontier.set(conversion.target, {
            weight,
            steps: [...reached.steps, conversion],
          });
        }
      });
    }
  }

  bestSequenceRoute(
    types: readonly TypeOfArgument[],
    insights: readonly Insight[],
    signature: readonly TypeOfArgument[]
  ): SequenceRouteResult {
    if (types.length !== signature.length || insights.length !== types.length) {
      throw new Error(
        `cannot route ${types.length} argument(s) to ${signature.length} parameter(s)`
      );
    }

    const routes: ConversionRoute[] = [];
    for (let index = 0; index < types.length; index++) {
      const result = this.bestRoute(types[index], insights[index], signature[index]);
      if (result.kind === "no-route") {
        return { kind: "no-route", argumentIndex: index };
      }
      routes.push(result.route);
    }
    return { kind: "routes", routes };
  }
}
