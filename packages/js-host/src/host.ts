import {
  ConversionTable,
  OverloadedSet,
  TypeRegistry,
  createDispatchEnvironment,
  type Alternative,
  type DispatchEnvironment,
  type DispatchLogWriter,
  type MemoryManager,
  type OverloadCache,
} from "@polycall/dispatch";
import { createJsFrontend } from "./frontend.js";
import { registerStandardConversions } from "./standard-conversions.js";
import { registerStandardTypes, type StandardTypes } from "./standard-types.js";

export type JsHostOptions = {
  memory?: MemoryManager;
  cache?: OverloadCache;
  logWriter?: DispatchLogWriter;
  /** Skip the built-in conversions between standard types. */
  standardConversions?: boolean;
};

export type JsHost = {
  registry: TypeRegistry;
  types: StandardTypes;
  table: ConversionTable;
  environment: DispatchEnvironment;
  createSet: (name: string, alternatives?: readonly Alternative[]) => OverloadedSet;
};

/** Wires the JS frontend, a conversion table and one shared cache together. */
export const createJsHost = ({
  memory,
  cache,
  logWriter,
  standardConversions = true,
}: JsHostOptions = {}): JsHost => {
  const registry = new TypeRegistry();
  const types = registerStandardTypes(registry);
  const table = new ConversionTable();
  if (standardConversions) {
    registerStandardConversions(table, types);
  }

  const environment = createDispatchEnvironment({
    detector: createJsFrontend(types),
    router: table,
    memory,
    cache,
    logWriter,
  });

  return {
    registry,
    types,
    table,
    environment,
    createSet: (name, alternatives = []) =>
      new OverloadedSet({ environment, name, alternatives }),
  };
};
