export {
  ARGUMENT_ARRAY_LIMIT,
  OverloadedSet,
} from "./overloaded-set.js";
export type { OverloadedSetOptions } from "./overloaded-set.js";
export {
  createAlternative,
  formatSignature,
  identicalAlternatives,
  signaturesMatch,
} from "./alternative.js";
export type { Alternative, AlternativeInput } from "./alternative.js";
export { compareAlternatives, routeWeights } from "./compare.js";
export type { OverloadRelationship } from "./compare.js";
export { OverloadCache, cacheKeysEqual, compareCacheKeys } from "./cache.js";
export type { CacheEntry, CacheKey, CacheOwner, CacheStats } from "./cache.js";
export { createCallScope, noopMemoryManager } from "./call-scope.js";
export type { CallScope, MemoryManager } from "./call-scope.js";
export { createDispatchEnvironment } from "./environment.js";
export type {
  DispatchEnvironment,
  DispatchEnvironmentOptions,
} from "./environment.js";
export {
  AmbiguityError,
  ArgumentLimitExceededError,
  DispatchError,
  NoMatchError,
  StaleCacheEntryError,
  formatDispatchErrorMessage,
  getDispatchErrorDefinition,
  isDispatchError,
  toError,
} from "./errors.js";
export type {
  DispatchErrorCode,
  DispatchErrorDefinition,
  DispatchErrorHint,
  DispatchErrorParams,
} from "./errors.js";
export type { TypeDetector } from "./frontend.js";
export {
  NO_INSIGHT,
  compareInsights,
  formatInsight,
  hashInsight,
  insightsEqual,
} from "./insight.js";
export type { Insight } from "./insight.js";
export { silentLogWriter } from "./log.js";
export type { DispatchLogWriter } from "./log.js";
export { TypeRegistry, formatTypeList } from "./type-registry.js";
export type { TypeOfArgument } from "./type-registry.js";
export {
  INFINITE_WEIGHT,
  ZERO_WEIGHT,
  addWeights,
  allPossible,
  compareWeights,
  createWeight,
  formatWeight,
  isPossible,
  weightLessThan,
} from "./weight.js";
export type { Weight, WeightInput } from "./weight.js";
export { createConversion } from "./conversion/conversion.js";
export type { Conversion, ConversionInput } from "./conversion/conversion.js";
export {
  createConversionRoute,
  formatRoute,
  identityRoute,
} from "./conversion/route.js";
export type { ConversionRoute } from "./conversion/route.js";
export type {
  ConversionRouter,
  RouteResult,
  SequenceRouteResult,
} from "./conversion/router.js";
export { ConversionTable } from "./conversion/table.js";
