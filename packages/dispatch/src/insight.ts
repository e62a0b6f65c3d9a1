import { murmurHash3 } from "@polycall/lib/murmur-hash";

/**
 * Auxiliary classification of an actual argument (an integer's bit width,
 * a string's shape) that can make one conversion cheaper or possible.
 * Insights are compared by value.
 */
export type Insight = number | string | null;

export const NO_INSIGHT: Insight = null;

const NULL_INSIGHT_HASH = 0x9e3779b9;

const insightRank = (insight: Insight): number =>
  insight === null ? 0 : typeof insight === "number" ? 1 : 2;

const compareNumbers = (a: number, b: number): -1 | 0 | 1 => {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

/** Total order: null, then numbers (NaN last), then strings. */
export const compareInsights = (a: Insight, b: Insight): -1 | 0 | 1 => {
  const rankA = insightRank(a);
  const rankB = insightRank(b);
  if (rankA !== rankB) return rankA < rankB ? -1 : 1;
  if (typeof a === "number" && typeof b === "number") {
    return compareNumbers(a, b);
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return 0;
};

export const insightsEqual = (a: Insight, b: Insight): boolean =>
  compareInsights(a, b) === 0;

export const hashInsight = (insight: Insight): number => {
  if (insight === null) return NULL_INSIGHT_HASH;
  // String(-0) is "0", so hashes agree with insightsEqual.
  return typeof insight === "number"
    ? murmurHash3(`n${String(insight)}`)
    : murmurHash3(`s${insight}`);
};

export const formatInsight = (insight: Insight): string =>
  insight === null ? "-" : typeof insight === "number" ? `${insight}` : `"${insight}"`;
