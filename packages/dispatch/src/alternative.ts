import { formatTypeList, type TypeOfArgument } from "./type-registry.js";

/** One candidate native function of an overloaded set. */
export type Alternative = {
  readonly name?: string;
  readonly signature: readonly TypeOfArgument[];
  readonly returnType: TypeOfArgument;
  invoke: (args: readonly unknown[]) => unknown;
};

export type AlternativeInput = {
  name?: string;
  signature: readonly TypeOfArgument[];
  returnType: TypeOfArgument;
  invoke: (args: readonly unknown[]) => unknown;
};

export const createAlternative = ({
  name,
  signature,
  returnType,
  invoke,
}: AlternativeInput): Alternative =>
  Object.freeze({
    name,
    signature: Object.freeze([...signature]),
    returnType,
    invoke,
  });

export const signaturesMatch = (
  a: readonly TypeOfArgument[],
  b: readonly TypeOfArgument[]
): boolean => a.length === b.length && a.every((type, i) => type === b[i]);

/**
 * Alternatives whose parameters are exactly the same, such as a const and a
 * non-const overload of one method. Ties between them are not ambiguous.
 */
export const identicalAlternatives = (
  a: Alternative,
  b: Alternative
): boolean => signaturesMatch(a.signature, b.signature);

export const formatSignature = (alternative: Alternative): string =>
  `${alternative.name ?? "<anonymous>"}(${formatTypeList(
    alternative.signature
  )}) -> ${alternative.returnType.name}`;
