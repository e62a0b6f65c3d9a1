import { describe, expect, it, vi } from "vitest";
import { createCallScope } from "../call-scope.js";

describe("createCallScope", () => {
  it("releases temporaries newest first, once", () => {
    const release = vi.fn();
    const scope = createCallScope({ release });
    scope.adopt("a");
    scope.adopt("b");
    scope.dispose();
    scope.dispose();

    expect(release.mock.calls).toEqual([["b"], ["a"]]);
    expect(scope.size).toBe(0);
  });

  it("releases the rest when one release fails", () => {
    const release = vi.fn((value: unknown) => {
      if (value === "b") throw new Error("boom");
    });
    const scope = createCallScope({ release });
    scope.adopt("a");
    scope.adopt("b");
    scope.adopt("c");

    expect(() => scope.dispose()).toThrow("failed to release call temporaries");
    expect(release).toHaveBeenCalledTimes(3);
  });

  it("refuses temporaries after disposal", () => {
    const scope = createCallScope({ release: () => {} });
    scope.dispose();
    expect(() => scope.adopt(1)).toThrow(
      "cannot adopt a temporary into a disposed call scope"
    );
  });
});
