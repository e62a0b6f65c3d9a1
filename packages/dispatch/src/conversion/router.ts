import type { Insight } from "../insight.js";
import type { TypeOfArgument } from "../type-registry.js";
import type { Conversion } from "./conversion.js";
import type { ConversionRoute } from "./route.js";

export type RouteResult =
  | { kind: "route"; route: ConversionRoute }
  | { kind: "no-route" };

export type SequenceRouteResult =
  | { kind: "routes"; routes: readonly ConversionRoute[] }
  | { kind: "no-route"; argumentIndex: number };

/** Finds the cheapest conversions between detected and formal types. */
export type ConversionRouter = {
  bestSequenceRoute: (
    types: readonly TypeOfArgument[],
    insights: readonly Insight[],
    signature: readonly TypeOfArgument[]
  ) => SequenceRouteResult;
  /** Conversion applied to values of `type` returned from a native call. */
  edgeConversion: (type: TypeOfArgument) => Conversion | undefined;
};
