import { NO_INSIGHT, type Insight, type TypeDetector } from "@polycall/dispatch";
import type { StandardTypes } from "./standard-types.js";

export const CHAR_INSIGHT = "char";

const NUMBER_WIDTHS = [8, 16, 32] as const;
const BIGINT_WIDTHS = [8n, 16n, 32n, 64n, 128n] as const;

/** Smallest signed width class holding `value`, 53 for other safe integers. */
export const integerWidth = (value: number): number | undefined => {
  if (!Number.isSafeInteger(value)) return undefined;
  const width = NUMBER_WIDTHS.find(
    (bits) => value >= -(2 ** (bits - 1)) && value < 2 ** (bits - 1)
  );
  return width ?? 53;
};

export const bigintWidth = (value: bigint): number | undefined => {
  const width = BIGINT_WIDTHS.find(
    (bits) => value >= -(1n << (bits - 1n)) && value < 1n << (bits - 1n)
  );
  return width === undefined ? undefined : Number(width);
};

const isPlainRecord = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/** Classifies JavaScript values (as decoded from msgpack or JSON). */
export const createJsFrontend = (types: StandardTypes): TypeDetector => ({
  detectType: (value) => {
    if (value === null || value === undefined) return types.null;
    switch (typeof value) {
      case "boolean":
        return types.bool;
      case "number":
        return Number.isSafeInteger(value) ? types.int : types.double;
      case "bigint":
        return types.long;
      case "string":
        return types.string;
    }
    if (value instanceof Uint8Array) return types.bytes;
    if (Array.isArray(value)) return types.list;
    if (value instanceof Map) return types.map;
    if (typeof value === "object" && isPlainRecord(value)) return types.map;
    return types.opaque;
  },
  detectInsight: (value): Insight => {
    if (typeof value === "number") return integerWidth(value) ?? NO_INSIGHT;
    if (typeof value === "bigint") return bigintWidth(value) ?? NO_INSIGHT;
    if (typeof value === "string" && value.length === 1) return CHAR_INSIGHT;
    return NO_INSIGHT;
  },
});
