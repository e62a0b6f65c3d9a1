import {
  NoMatchError,
  createAlternative,
  formatRoute,
  type TypeOfArgument,
} from "@polycall/dispatch";
import { describe, expect, it, vi } from "vitest";
import { createJsHost } from "../host.js";

const echo = (
  name: string,
  signature: readonly TypeOfArgument[],
  returnType: TypeOfArgument
) =>
  createAlternative({
    name,
    signature,
    returnType,
    invoke: ([value]) => value,
  });

describe("standard conversions", () => {
  it("narrows ints to short only when the value fits", () => {
    const { types, createSet } = createJsHost();
    const set = createSet("store", [echo("store", [types.short], types.short)]);

    expect(set.call([100])).toBe(100);
    expect(() => set.call([40000])).toThrow(NoMatchError);
  });

  it("widens ints to long and releases the temporary", () => {
    const memory = { release: vi.fn() };
    const { types, createSet } = createJsHost({ memory });
    const set = createSet("f", [echo("f", [types.long], types.long)]);

    expect(set.call([5])).toBe(5n);
    expect(memory.release).toHaveBeenCalledWith(5n);
  });

  it("converts longs and bools", () => {
    const { types, createSet } = createJsHost();

    expect(createSet("d", [echo("d", [types.double], types.double)]).call([5n])).toBe(5);
    expect(createSet("i", [echo("i", [types.int], types.int)]).call([true])).toBe(1);
  });

  it("prefers the direct int to double conversion", () => {
    const { types, table } = createJsHost();
    const result = table.bestRoute(types.int, 8, types.double);

    expect(result.kind === "route" && formatRoute(result.route)).toBe(
      "int -> double"
    );
  });

  it("passes one-character strings as char codes", () => {
    const { types, createSet } = createJsHost();
    const set = createSet("ord", [echo("ord", [types.char], types.int)]);

    expect(set.call(["A"])).toBe(65);
    expect(() => set.call(["AB"])).toThrow(NoMatchError);
  });

  it("turns returned char codes into strings", () => {
    const { types, createSet } = createJsHost();
    const set = createSet("chr", [echo("chr", [types.int], types.char)]);

    expect(set.call([66])).toBe("B");
  });

  it("can start from an empty conversion table", () => {
    const { types, createSet } = createJsHost({ standardConversions: false });
    const set = createSet("f", [echo("f", [types.long], types.long)]);

    expect(() => set.call([5])).toThrow(NoMatchError);
  });
});
