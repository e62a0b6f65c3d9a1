import {
  createAlternative,
  formatSignature,
  type Alternative,
  type OverloadedSet,
  type TypeOfArgument,
  type WeightInput,
} from "@polycall/dispatch";
import type { JsHost } from "./host.js";

const WEIGHT_FIELDS = ["userDefined", "upcast", "promotion", "epsilon"] as const;

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const property = (value: unknown, key: string): unknown =>
  isObject(value) ? value[key] : undefined;

export class ManifestError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ManifestError";
    this.path = path;
  }
}

const readTypeName = (
  host: JsHost,
  name: unknown,
  path: string
): TypeOfArgument => {
  if (typeof name !== "string") {
    throw new ManifestError(path, "expected a type name");
  }
  const type = host.registry.lookup(name);
  if (!type) {
    throw new ManifestError(path, `unknown type ${name}`);
  }
  return type;
};

const readWeight = (value: unknown, path: string): WeightInput => {
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new ManifestError(path, "expected a weight object");
  }
  const weight: { -readonly [K in keyof WeightInput]: WeightInput[K] } = {};
  WEIGHT_FIELDS.forEach((field) => {
    const component = value[field];
    if (component === undefined) return;
    if (typeof component !== "number" || !(component >= 0)) {
      throw new ManifestError(
        `${path}.${field}`,
        "expected a non-negative number"
      );
    }
    weight[field] = component;
  });
  return weight;
};

const readTypes = (host: JsHost, manifest: unknown): void => {
  const types = property(manifest, "types");
  if (types === undefined) return;
  if (!Array.isArray(types)) {
    throw new ManifestError("types", "expected an array of type names");
  }
  types.forEach((name, index) => {
    if (typeof name !== "string" || name.length === 0) {
      throw new ManifestError(`types[${index}]`, "expected a type name");
    }
    host.registry.intern(name);
  });
};

const readConversions = (host: JsHost, manifest: unknown): void => {
  const conversions = property(manifest, "conversions");
  if (conversions === undefined) return;
  if (!Array.isArray(conversions)) {
    throw new ManifestError("conversions", "expected an array");
  }
  conversions.forEach((entry, index) => {
    const path = `conversions[${index}]`;
    const input = {
      source: readTypeName(host, property(entry, "source"), `${path}.source`),
      target: readTypeName(host, property(entry, "target"), `${path}.target`),
      weight: readWeight(property(entry, "weight"), `${path}.weight`),
    };
    if (property(entry, "edge") === true) {
      host.table.registerEdgeConversion(input);
    } else if (input.source === input.target) {
      throw new ManifestError(path, `conversion from ${input.source.name} to itself`);
    } else {
      host.table.registerConversion(input);
    }
  });
};

/** Alternatives declared in a manifest answer with their own signature. */
const readAlternative = (
  host: JsHost,
  entry: unknown,
  setName: string,
  path: string
): Alternative => {
  const name = property(entry, "name");
  const signature = property(entry, "signature");
  if (!Array.isArray(signature)) {
    throw new ManifestError(`${path}.signature`, "expected an array of type names");
  }
  const alternative: Alternative = createAlternative({
    name: typeof name === "string" ? name : setName,
    signature: signature.map((type, index) =>
      readTypeName(host, type, `${path}.signature[${index}]`)
    ),
    returnType: readTypeName(host, property(entry, "returns"), `${path}.returns`),
    invoke: () => formatSignature(alternative),
  });
  return alternative;
};

/**
 * Builds overloaded sets from a parsed JSON manifest:
 *
 * ```json
 * {
 *   "types": ["celsius"],
 *   "conversions": [{ "source": "double", "target": "celsius", "weight": { "userDefined": 1 } }],
 *   "sets": { "show": [{ "signature": ["int"], "returns": "string" }] }
 * }
 * ```
 */
export const loadManifest = (
  host: JsHost,
  manifest: unknown
): ReadonlyMap<string, OverloadedSet> => {
  if (!isObject(manifest)) {
    throw new ManifestError("$", "expected an object");
  }
  readTypes(host, manifest);
  readConversions(host, manifest);

  const sets = property(manifest, "sets");
  if (!isObject(sets)) {
    throw new ManifestError("sets", "expected an object of overloaded sets");
  }
  const loaded = new Map<string, OverloadedSet>();
  Object.entries(sets).forEach(([name, alternatives]) => {
    if (!Array.isArray(alternatives)) {
      throw new ManifestError(`sets.${name}`, "expected an array of alternatives");
    }
    loaded.set(
      name,
      host.createSet(
        name,
        alternatives.map((entry, index) =>
          readAlternative(host, entry, name, `sets.${name}[${index}]`)
        )
      )
    );
  });
  return loaded;
};
