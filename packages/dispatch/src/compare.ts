import type { ConversionRoute } from "./conversion/route.js";
import type { Insight } from "./insight.js";
import { weightLessThan, type Weight } from "./weight.js";

export type OverloadRelationship =
  | "better"
  | "worse"
  | "equivalent"
  | "ambiguous";

/**
 * Compares the routes suggested for a candidate against the weights of the
 * best candidate so far, position by position. `suggested` is better when it
 * wins somewhere and loses nowhere; when it both wins and loses the two are
 * incomparable.
 *
 * The relation is not transitive once ties are involved, so callers compare
 * each candidate against the current best only.
 */
export const compareAlternatives = (
  known: readonly Weight[],
  suggested: readonly ConversionRoute[],
  insights: readonly Insight[]
): OverloadRelationship => {
  if (known.length !== suggested.length || insights.length !== known.length) {
    throw new Error(
      `cannot compare ${suggested.length} route(s) against ${known.length} weight(s)`
    );
  }
  if (known.length === 0) return "better";

  let betterWitness = false;
  let worseWitness = false;
  for (let index = 0; index < known.length; index++) {
    const suggestedWeight = suggested[index].totalWeight(insights[index]);
    if (weightLessThan(known[index], suggestedWeight)) {
      worseWitness = true;
    } else if (weightLessThan(suggestedWeight, known[index])) {
      betterWitness = true;
    }
  }

  if (betterWitness !== worseWitness) {
    return betterWitness ? "better" : "worse";
  }
  return betterWitness ? "ambiguous" : "equivalent";
};

export const routeWeights = (
  routes: readonly ConversionRoute[],
  insights: readonly Insight[]
): Weight[] => routes.map((route, index) => route.totalWeight(insights[index]));
