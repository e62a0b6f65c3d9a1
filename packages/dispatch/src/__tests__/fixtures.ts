import { vi } from "vitest";
import { createAlternative, type Alternative } from "../alternative.js";
import { ConversionTable } from "../conversion/table.js";
import { createDispatchEnvironment } from "../environment.js";
import type { TypeDetector } from "../frontend.js";
import type { Insight } from "../insight.js";
import { OverloadedSet } from "../overloaded-set.js";
import { TypeRegistry, type TypeOfArgument } from "../type-registry.js";

/** A test value that names its own type and insight. */
export type Tagged = {
  readonly type: string;
  readonly value: unknown;
  readonly insight: Insight;
};

export const tagged = (
  type: string,
  value: unknown,
  insight: Insight = null
): Tagged => ({ type, value, insight });

const isTagged = (value: unknown): value is Tagged =>
  typeof value === "object" &&
  value !== null &&
  "type" in value &&
  "value" in value &&
  "insight" in value;

export const createFixture = () => {
  const registry = new TypeRegistry();
  const types = {
    int: registry.intern("int"),
    long: registry.intern("long"),
    short: registry.intern("short"),
    float: registry.intern("float"),
    string: registry.intern("string"),
    code: registry.intern("code"),
  };

  const detector: TypeDetector = {
    detectType: (value) => {
      if (isTagged(value)) return registry.require(value.type);
      if (typeof value === "number") {
        return Number.isInteger(value) ? types.int : types.float;
      }
      if (typeof value === "string") return types.string;
      throw new Error(`test detector cannot classify ${String(value)}`);
    },
    detectInsight: (value) => (isTagged(value) ? value.insight : null),
  };

  const table = new ConversionTable();
  const memory = { release: vi.fn() };
  const environment = createDispatchEnvironment({
    detector,
    router: table,
    memory,
  });

  const createSet = (name: string, alternatives: Alternative[] = []) =>
    new OverloadedSet({ environment, name, alternatives });

  return { registry, types, detector, table, memory, environment, createSet };
};

/** An alternative that reports which overload ran and what it received. */
export const probe = (
  name: string,
  signature: readonly TypeOfArgument[],
  returnType: TypeOfArgument
): Alternative =>
  createAlternative({
    name,
    signature,
    returnType,
    invoke: (args) => ({ name, args }),
  });
