import {
  INFINITE_WEIGHT,
  createWeight,
  type ConversionTable,
  type Insight,
} from "@polycall/dispatch";
import { CHAR_INSIGHT } from "./frontend.js";
import type { StandardTypes } from "./standard-types.js";

const SHORT_MAX_WIDTH = 16;

const onlyWhen =
  (accepts: (insight: Insight) => boolean, weight = createWeight({ promotion: 1 })) =>
  (insight: Insight) =>
    accepts(insight) ? weight : INFINITE_WEIGHT;

/**
 * Conversions between the standard types. Narrowing conversions are only
 * possible when the argument's insight shows the value fits.
 */
export const registerStandardConversions = (
  table: ConversionTable,
  types: StandardTypes
): void => {
  table.registerConversion({
    source: types.int,
    target: types.long,
    weight: { promotion: 1 },
    apply: (value) => (typeof value === "number" ? BigInt(value) : value),
  });
  table.registerConversion({
    source: types.int,
    target: types.double,
    weight: { promotion: 2 },
  });
  table.registerConversion({
    source: types.int,
    target: types.short,
    weight: onlyWhen(
      (insight) => typeof insight === "number" && insight <= SHORT_MAX_WIDTH
    ),
  });
  table.registerConversion({
    source: types.long,
    target: types.double,
    weight: { promotion: 2, epsilon: 1 },
    apply: (value) => (typeof value === "bigint" ? Number(value) : value),
  });
  table.registerConversion({
    source: types.bool,
    target: types.int,
    weight: { promotion: 1 },
    apply: (value) => (value === true ? 1 : value === false ? 0 : value),
  });
  table.registerConversion({
    source: types.string,
    target: types.char,
    weight: onlyWhen(
      (insight) => insight === CHAR_INSIGHT,
      createWeight({ epsilon: 1 })
    ),
    apply: (value) => (typeof value === "string" ? value.charCodeAt(0) : value),
  });

  // Native chars come back as character codes.
  table.registerEdgeConversion({
    source: types.char,
    target: types.string,
    weight: {},
    apply: (value) =>
      typeof value === "number" ? String.fromCharCode(value) : value,
  });
};
