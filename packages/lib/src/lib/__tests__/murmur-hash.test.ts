import { describe, expect, test } from "vitest";
import { murmurHash3, murmurHash3Words } from "../murmur-hash.js";

describe("murmurHash3", () => {
  test("hashes the empty string to zero with the default seed", () => {
    expect(murmurHash3("")).toBe(0);
  });

  test("matches the reference value for a three byte key", () => {
    expect(murmurHash3("abc")).toBe(3017643002);
  });

  test("is stable for the same input and seed", () => {
    expect(murmurHash3("int/53", 7)).toBe(murmurHash3("int/53", 7));
  });

  test("changes with the seed", () => {
    expect(murmurHash3("int", 1)).not.toBe(murmurHash3("int", 2));
  });
});

describe("murmurHash3Words", () => {
  test("hashes an empty word list to zero with the default seed", () => {
    expect(murmurHash3Words([])).toBe(0);
  });

  test("agrees with the string hash over the same little-endian bytes", () => {
    expect(murmurHash3Words([0x64636261])).toBe(murmurHash3("abcd"));
    expect(murmurHash3Words([0x64636261, 0x68676665])).toBe(
      murmurHash3("abcdefgh")
    );
  });

  test("accepts typed arrays", () => {
    const words = Uint32Array.from([3, 1, 4]);
    expect(murmurHash3Words(words)).toBe(murmurHash3Words([3, 1, 4]));
  });

  test("is sensitive to word order", () => {
    expect(murmurHash3Words([1, 2])).not.toBe(murmurHash3Words([2, 1]));
  });
});
