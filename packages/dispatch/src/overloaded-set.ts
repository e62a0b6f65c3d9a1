import {
  formatSignature,
  identicalAlternatives,
  signaturesMatch,
  type Alternative,
} from "./alternative.js";
import type { CacheOwner } from "./cache.js";
import { createCallScope, type CallScope } from "./call-scope.js";
import { compareAlternatives, routeWeights } from "./compare.js";
import type { ConversionRoute } from "./conversion/route.js";
import type { DispatchEnvironment } from "./environment.js";
import {
  AmbiguityError,
  ArgumentLimitExceededError,
  NoMatchError,
  StaleCacheEntryError,
  toError,
} from "./errors.js";
import { formatInsight, type Insight } from "./insight.js";
import { formatTypeList, type TypeOfArgument } from "./type-registry.js";
import { allPossible, formatWeight, INFINITE_WEIGHT, type Weight } from "./weight.js";

/** Calls accept at most this many arguments. */
export const ARGUMENT_ARRAY_LIMIT = 12;

let nextSetId = 1;

type Selection = {
  alternative: Alternative;
  index: number;
  routes: readonly ConversionRoute[];
};

export type OverloadedSetOptions = {
  environment: DispatchEnvironment;
  name?: string;
  alternatives?: readonly Alternative[];
};

/**
 * Ordered, append-only collection of alternatives that receives calls from
 * a dynamically-typed caller and forwards each to the cheapest alternative.
 *
 * Registration order matters: it is the cache index, and when candidates tie
 * the sticky ambiguity verdict depends on which came first.
 */
export class OverloadedSet implements CacheOwner {
  readonly id = nextSetId++;
  readonly name?: string;
  #environment: DispatchEnvironment;
  #alternatives: Alternative[];

  constructor({ environment, name, alternatives = [] }: OverloadedSetOptions) {
    this.#environment = environment;
    this.name = name;
    this.#alternatives = [...alternatives];
  }

  get environment(): DispatchEnvironment {
    return this.#environment;
  }

  get alternatives(): readonly Alternative[] {
    return this.#alternatives;
  }

  get size(): number {
    return this.#alternatives.length;
  }

  /**
   * Appends an alternative. Earlier resolutions stay cached until
   * {@link forceRecompute} is called.
   */
  addAlternative(alternative: Alternative): void {
    this.#alternatives.push(alternative);
  }

  /** Appends every alternative of `other`, which remains usable. */
  addAlternatives(other: OverloadedSet): void {
    this.#alternatives.push(...other.alternatives);
  }

  /** Finds an alternative whose signature is exactly `prototype`. */
  seekAlternative(
    prototype: readonly TypeOfArgument[]
  ): Alternative | undefined {
    return this.#alternatives.find((alternative) =>
      signaturesMatch(alternative.signature, prototype)
    );
  }

  /** Flushes the resolution cache shared through this set's environment. */
  forceRecompute(): void {
    this.#environment.cache.flush();
    this.#log(`cache flushed`);
  }

  call(args: readonly unknown[]): unknown {
    if (args.length > ARGUMENT_ARRAY_LIMIT) {
      throw new ArgumentLimitExceededError({
        limit: ARGUMENT_ARRAY_LIMIT,
        received: args.length,
      });
    }

    const { detector, memory } = this.#environment;
    const types: TypeOfArgument[] = [];
    const insights: Insight[] = [];
    args.forEach((arg) => {
      types.push(detector.detectType(arg));
      insights.push(detector.detectInsight(arg));
    });

    const scope = createCallScope(memory);
    try {
      const selection =
        this.#recall(types, insights) ?? this.#resolve(types, insights);
      const converted = args.map((arg, index) =>
        selection.routes[index].apply(arg, scope)
      );
      const result = selection.alternative.invoke(converted);
      return this.#applyEdgeConversion(selection.alternative, result);
    } finally {
      this.#releaseTemporaries(scope);
    }
  }

  /** Logs release failures; the call's own result or error stands. */
  #releaseTemporaries(scope: CallScope): void {
    try {
      scope.dispose();
    } catch (error) {
      this.#environment.logWriter.error(
        `${this.#label()}: ${toError(error).message}`,
        error
      );
    }
  }

  #recall(
    types: readonly TypeOfArgument[],
    insights: readonly Insight[]
  ): Selection | undefined {
    const { cache, router } = this.#environment;
    const index = cache.recall(this, types, insights);
    if (index === undefined) return undefined;

    const alternative = this.#alternatives.at(index);
    if (!alternative) {
      throw new StaleCacheEntryError({
        kind: "missing-alternative",
        setName: this.name,
        index,
      });
    }

    const result = router.bestSequenceRoute(types, insights, alternative.signature);
    if (result.kind === "no-route") {
      throw new StaleCacheEntryError({
        kind: "no-route",
        setName: this.name,
        index,
        argumentIndex: result.argumentIndex,
      });
    }
    if (!allPossible(routeWeights(result.routes, insights))) {
      throw new StaleCacheEntryError({
        kind: "impossible-weight",
        setName: this.name,
        index,
      });
    }

    this.#log(`cache hit (${formatTypeList(types)}) -> #${index}`);
    return { alternative, index, routes: result.routes };
  }

  #resolve(
    types: readonly TypeOfArgument[],
    insights: readonly Insight[]
  ): Selection {
    const { cache, router } = this.#environment;
    const arity = types.length;
    this.#log(
      `resolving (${types
        .map((type, i) => `${type.name}:${formatInsight(insights[i])}`)
        .join(", ")})`
    );

    let best: Selection | undefined;
    let bestWeight: Weight[] = new Array<Weight>(arity).fill(INFINITE_WEIGHT);
    let ambiguous = false;
    let tied: Alternative[] = [];
    let candidates = 0;

    for (let index = 0; index < this.#alternatives.length; index++) {
      const alternative = this.#alternatives[index];
      if (alternative.signature.length !== arity) continue;
      candidates++;

      const result = router.bestSequenceRoute(types, insights, alternative.signature);
      if (result.kind === "no-route") {
        this.#log(
          `  #${index} ${formatSignature(alternative)}: no conversion for argument ${result.argumentIndex + 1}`
        );
        continue;
      }

      const relationship = compareAlternatives(bestWeight, result.routes, insights);
      this.#log(`  #${index} ${formatSignature(alternative)}: ${relationship}`);
      switch (relationship) {
        case "better":
          best = { alternative, index, routes: result.routes };
          bestWeight = routeWeights(result.routes, insights);
          tied = [alternative];
          ambiguous = false;
          break;
        case "worse":
          break;
        case "equivalent":
        case "ambiguous":
          // Nothing to be ambiguous with until a usable candidate is found.
          if (best && !identicalAlternatives(best.alternative, alternative)) {
            ambiguous = true;
            tied.push(alternative);
          }
          break;
      }
    }

    const argumentTypes = types.map((type) => type.name);
    if (!best || !allPossible(bestWeight)) {
      this.#log(`  no match among ${candidates} candidate(s)`);
      throw new NoMatchError({ setName: this.name, argumentTypes, candidates });
    }
    if (ambiguous) {
      this.#log(`  ambiguous between ${tied.length} candidate(s)`);
      throw new AmbiguityError({
        setName: this.name,
        argumentTypes,
        candidates: tied.map(formatSignature),
      });
    }

    cache.remember(this, types, insights, best.index);
    this.#log(
      `  selected #${best.index} with weights ${bestWeight.map(formatWeight).join(" ")}`
    );
    return best;
  }

  #applyEdgeConversion(alternative: Alternative, result: unknown): unknown {
    const { router, memory } = this.#environment;
    const edge = router.edgeConversion(alternative.returnType);
    if (!edge) return result;
    const converted = edge.apply(result);
    memory.release(result);
    return converted;
  }

  #label(): string {
    return `[polycall] ${this.name ?? `set#${this.id}`}`;
  }

  #log(message: string): void {
    this.#environment.logWriter.debug(`${this.#label()}: ${message}`);
  }
}
