import { murmurHash3Words } from "@polycall/lib/murmur-hash";
import { compareInsights, hashInsight, insightsEqual, type Insight } from "./insight.js";
import type { TypeOfArgument } from "./type-registry.js";

/** Anything whose identity scopes cache entries, normally an overloaded set. */
export type CacheOwner = {
  readonly id: number;
};

export type CacheKey = {
  readonly owner: CacheOwner;
  readonly types: readonly TypeOfArgument[];
  readonly insights: readonly Insight[];
};

export type CacheEntry = CacheKey & {
  readonly alternativeIndex: number;
};

export type CacheStats = {
  hits: number;
  misses: number;
  entries: number;
};

const hashKey = ({ owner, types, insights }: CacheKey): number => {
  const words = new Array<number>(2 + types.length * 2);
  words[0] = owner.id;
  words[1] = types.length;
  for (let i = 0; i < types.length; i++) {
    words[2 + i * 2] = types[i].id;
    words[3 + i * 2] = hashInsight(insights[i]);
  }
  return murmurHash3Words(words);
};

export const cacheKeysEqual = (a: CacheKey, b: CacheKey): boolean => {
  if (a.owner !== b.owner) return false;
  if (a.types.length !== b.types.length) return false;
  for (let i = 0; i < a.types.length; i++) {
    if (a.types[i] !== b.types[i]) return false;
    if (!insightsEqual(a.insights[i], b.insights[i])) return false;
  }
  return true;
};

/** Orders keys by owner, argument count, then each (type, insight) pair. */
export const compareCacheKeys = (a: CacheKey, b: CacheKey): number => {
  if (a.owner.id !== b.owner.id) return a.owner.id < b.owner.id ? -1 : 1;
  if (a.types.length !== b.types.length) {
    return a.types.length < b.types.length ? -1 : 1;
  }
  for (let i = 0; i < a.types.length; i++) {
    if (a.types[i].id !== b.types[i].id) {
      return a.types[i].id < b.types[i].id ? -1 : 1;
    }
    const insightOrder = compareInsights(a.insights[i], b.insights[i]);
    if (insightOrder !== 0) return insightOrder;
  }
  return 0;
};

const assertKeyShape = (
  types: readonly TypeOfArgument[],
  insights: readonly Insight[]
): void => {
  if (types.length !== insights.length) {
    throw new Error(
      `cache key has ${types.length} type(s) but ${insights.length} insight(s)`
    );
  }
};

/**
 * Remembers which alternative won resolution for a given owner and argument
 * shape. Entries keep their own frozen copies of the key arrays; the
 * caller's arrays are never retained.
 */
export class OverloadCache {
  #buckets = new Map<number, CacheEntry[]>();
  #size = 0;
  #hits = 0;
  #misses = 0;

  recall(
    owner: CacheOwner,
    types: readonly TypeOfArgument[],
    insights: readonly Insight[]
  ): number | undefined {
    assertKeyShape(types, insights);
    const key: CacheKey = { owner, types, insights };
    const entry = this.#buckets
      .get(hashKey(key))
      ?.find((candidate) => cacheKeysEqual(candidate, key));
    if (!entry) {
      this.#misses++;
      return undefined;
    }
    this.#hits++;
    return entry.alternativeIndex;
  }

  remember(
    owner: CacheOwner,
    types: readonly TypeOfArgument[],
    insights: readonly Insight[],
    alternativeIndex: number
  ): void {
    assertKeyShape(types, insights);
    if (!Number.isInteger(alternativeIndex) || alternativeIndex < 0) {
      throw new Error(`invalid alternative index ${alternativeIndex}`);
    }

    const entry: CacheEntry = Object.freeze({
      owner,
      types: Object.freeze([...types]),
      insights: Object.freeze([...insights]),
      alternativeIndex,
    });
    const hash = hashKey(entry);
    const bucket = this.#buckets.get(hash) ?? [];
    const existing = bucket.findIndex((candidate) =>
      cacheKeysEqual(candidate, entry)
    );
    if (existing >= 0) {
      bucket[existing] = entry;
    } else {
      bucket.push(entry);
      this.#size++;
    }
    this.#buckets.set(hash, bucket);
  }

  flush(): void {
    this.#buckets.clear();
    this.#size = 0;
  }

  get size(): number {
    return this.#size;
  }

  stats(): CacheStats {
    return { hits: this.#hits, misses: this.#misses, entries: this.#size };
  }

  resetStats(): void {
    this.#hits = 0;
    this.#misses = 0;
  }

  entries(): CacheEntry[] {
    return [...this.#buckets.values()].flat().sort(compareCacheKeys);
  }
}
