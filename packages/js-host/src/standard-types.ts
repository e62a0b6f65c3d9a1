import type { TypeOfArgument, TypeRegistry } from "@polycall/dispatch";

/**
 * Types every JS host knows about. `short` and `char` never come out of
 * detection; they exist so native signatures can ask for them. `opaque`
 * covers values nothing else classifies, such as decoded msgpack timestamps.
 */
export type StandardTypes = {
  null: TypeOfArgument;
  bool: TypeOfArgument;
  int: TypeOfArgument;
  short: TypeOfArgument;
  long: TypeOfArgument;
  double: TypeOfArgument;
  string: TypeOfArgument;
  char: TypeOfArgument;
  bytes: TypeOfArgument;
  list: TypeOfArgument;
  map: TypeOfArgument;
  opaque: TypeOfArgument;
};

export const registerStandardTypes = (
  registry: TypeRegistry
): StandardTypes => ({
  null: registry.intern("null"),
  bool: registry.intern("bool"),
  int: registry.intern("int"),
  short: registry.intern("short"),
  long: registry.intern("long"),
  double: registry.intern("double"),
  string: registry.intern("string"),
  char: registry.intern("char"),
  bytes: registry.intern("bytes"),
  list: registry.intern("list"),
  map: registry.intern("map"),
  opaque: registry.intern("opaque"),
});
