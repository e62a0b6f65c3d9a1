export type DispatchErrorHint = {
  message: string;
};

type DispatchErrorMessage<P> = (params: P) => string;

export type DispatchErrorDefinition<P> = {
  code: string;
  message: DispatchErrorMessage<P>;
  hints?: readonly DispatchErrorHint[];
};

type DispatchErrorParamsMap = {
  DP0001: { kind: "argument-limit-exceeded"; limit: number; received: number };
  DP0002: {
    kind: "no-match";
    setName?: string;
    argumentTypes: readonly string[];
    candidates: number;
  };
  DP0003: {
    kind: "ambiguous";
    setName?: string;
    argumentTypes: readonly string[];
    candidates: readonly string[];
  };
  DP0004:
    | { kind: "missing-alternative"; setName?: string; index: number }
    | {
        kind: "no-route";
        setName?: string;
        index: number;
        argumentIndex: number;
      }
    | { kind: "impossible-weight"; setName?: string; index: number };
};

export type DispatchErrorCode = keyof DispatchErrorParamsMap;

export type DispatchErrorParams<K extends DispatchErrorCode> =
  DispatchErrorParamsMap[K];

const exhaustive = (value: never): never => {
  throw new Error(`unhandled dispatch error params ${JSON.stringify(value)}`);
};

const describeCall = (
  setName: string | undefined,
  argumentTypes: readonly string[]
): string => `${setName ?? "overloaded set"}(${argumentTypes.join(", ")})`;

const DISPATCH_ERRORS: {
  [K in DispatchErrorCode]: DispatchErrorDefinition<DispatchErrorParamsMap[K]>;
} = {
  DP0001: {
    code: "DP0001",
    message: (params) =>
      `argument limit exceeded: ${params.received} arguments given, at most ${params.limit} supported`,
    hints: [
      { message: "Pass the extra values in a list or map argument instead." },
    ],
  } satisfies DispatchErrorDefinition<DispatchErrorParamsMap["DP0001"]>,
  DP0002: {
    code: "DP0002",
    message: (params) =>
      params.candidates === 0
        ? `no overloaded member matches arguments: ${describeCall(params.setName, params.argumentTypes)} (no alternative takes ${params.argumentTypes.length} argument(s))`
        : `no overloaded member matches arguments: ${describeCall(params.setName, params.argumentTypes)}`,
  } satisfies DispatchErrorDefinition<DispatchErrorParamsMap["DP0002"]>,
  DP0003: {
    code: "DP0003",
    message: (params) =>
      `call is ambiguous with given arguments: ${describeCall(params.setName, params.argumentTypes)}; candidates: ${params.candidates.join(", ")}`,
    hints: [
      {
        message:
          "Register an alternative that is strictly cheaper for these argument types, or convert an argument explicitly before the call.",
      },
    ],
  } satisfies DispatchErrorDefinition<DispatchErrorParamsMap["DP0003"]>,
  DP0004: {
    code: "DP0004",
    message: (params) => {
      const owner = params.setName ?? "overloaded set";
      switch (params.kind) {
        case "missing-alternative":
          return `cached alternative #${params.index} no longer exists in ${owner}`;
        case "no-route":
          return `cached alternative #${params.index} of ${owner} cannot convert argument ${params.argumentIndex + 1}`;
        case "impossible-weight":
          return `cached alternative #${params.index} of ${owner} requires an impossible conversion`;
      }
      return exhaustive(params);
    },
    hints: [
      {
        message:
          "Call forceRecompute() after changing alternatives or conversions that earlier calls were resolved against.",
      },
    ],
  } satisfies DispatchErrorDefinition<DispatchErrorParamsMap["DP0004"]>,
};

export const getDispatchErrorDefinition = <K extends DispatchErrorCode>(
  code: K
): DispatchErrorDefinition<DispatchErrorParamsMap[K]> => DISPATCH_ERRORS[code];

export const formatDispatchErrorMessage = <K extends DispatchErrorCode>(
  code: K,
  params: DispatchErrorParamsMap[K]
): string => `${code}: ${getDispatchErrorDefinition(code).message(params)}`;

export class DispatchError<
  K extends DispatchErrorCode = DispatchErrorCode,
> extends Error {
  readonly code: K;
  readonly params: DispatchErrorParamsMap[K];
  readonly hints: readonly DispatchErrorHint[];

  constructor(code: K, params: DispatchErrorParamsMap[K]) {
    super(formatDispatchErrorMessage(code, params));
    this.name = "DispatchError";
    this.code = code;
    this.params = params;
    this.hints = getDispatchErrorDefinition(code).hints ?? [];
  }
}

export class ArgumentLimitExceededError extends DispatchError<"DP0001"> {
  constructor(params: Omit<DispatchErrorParamsMap["DP0001"], "kind">) {
    super("DP0001", { kind: "argument-limit-exceeded", ...params });
    this.name = "ArgumentLimitExceededError";
  }
}

export class NoMatchError extends DispatchError<"DP0002"> {
  constructor(params: Omit<DispatchErrorParamsMap["DP0002"], "kind">) {
    super("DP0002", { kind: "no-match", ...params });
    this.name = "NoMatchError";
  }
}

export class AmbiguityError extends DispatchError<"DP0003"> {
  constructor(params: Omit<DispatchErrorParamsMap["DP0003"], "kind">) {
    super("DP0003", { kind: "ambiguous", ...params });
    this.name = "AmbiguityError";
  }
}

/** A cached resolution no longer fits the set it was recorded for. */
export class StaleCacheEntryError extends DispatchError<"DP0004"> {
  constructor(params: DispatchErrorParamsMap["DP0004"]) {
    super("DP0004", params);
    this.name = "StaleCacheEntryError";
  }
}

export const isDispatchError = <K extends DispatchErrorCode>(
  error: unknown,
  code?: K
): error is DispatchError<K> =>
  error instanceof DispatchError && (code === undefined || error.code === code);

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
