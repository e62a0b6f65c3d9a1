import { describe, expect, it } from "vitest";
import {
  AmbiguityError,
  ArgumentLimitExceededError,
  DispatchError,
  StaleCacheEntryError,
  formatDispatchErrorMessage,
  isDispatchError,
  toError,
} from "../errors.js";

describe("dispatch errors", () => {
  it("prefixes messages with their code", () => {
    const error = new ArgumentLimitExceededError({ limit: 12, received: 13 });
    expect(error.message).toBe(
      "DP0001: argument limit exceeded: 13 arguments given, at most 12 supported"
    );
    expect(error.params).toEqual({
      kind: "argument-limit-exceeded",
      limit: 12,
      received: 13,
    });
    expect(error.hints).toHaveLength(1);
    expect(error).toBeInstanceOf(DispatchError);
  });

  it("lists ambiguous candidates", () => {
    const error = new AmbiguityError({
      argumentTypes: ["int", "int"],
      candidates: ["f(int, long) -> int", "f(long, int) -> int"],
    });
    expect(error.message).toBe(
      "DP0003: call is ambiguous with given arguments: overloaded set(int, int); candidates: f(int, long) -> int, f(long, int) -> int"
    );
  });

  it("describes each kind of stale cache entry", () => {
    expect(
      formatDispatchErrorMessage("DP0004", {
        kind: "missing-alternative",
        setName: "f",
        index: 2,
      })
    ).toBe("DP0004: cached alternative #2 no longer exists in f");
    expect(
      new StaleCacheEntryError({ kind: "impossible-weight", index: 0 }).message
    ).toBe(
      "DP0004: cached alternative #0 of overloaded set requires an impossible conversion"
    );
  });

  it("narrows by code", () => {
    const error: unknown = new StaleCacheEntryError({
      kind: "missing-alternative",
      index: 1,
    });
    expect(isDispatchError(error)).toBe(true);
    expect(isDispatchError(error, "DP0004")).toBe(true);
    expect(isDispatchError(error, "DP0002")).toBe(false);
    expect(isDispatchError(new Error("plain"))).toBe(false);
  });

  it("wraps thrown non-errors", () => {
    expect(toError("nope").message).toBe("nope");
    const error = new Error("kept");
    expect(toError(error)).toBe(error);
  });
});
