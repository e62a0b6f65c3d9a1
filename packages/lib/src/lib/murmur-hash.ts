const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const mixBlock = (h1: number, block: number): number => {
  let k1 = Math.imul(block, C1);
  k1 = (k1 << 15) | (k1 >>> 17);
  k1 = Math.imul(k1, C2);

  let h = h1 ^ k1;
  h = (h << 13) | (h >>> 19);
  return Math.imul(h, 5) + 0xe6546b64;
};

const finalize = (h1: number, byteLength: number): number => {
  let h = h1 ^ byteLength;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
};

/** 32-bit murmur3 over the low byte of each UTF-16 code unit of `key`. */
export const murmurHash3 = (key: string, seed: number = 0): number => {
  let h1 = seed;
  const remainder = key.length % 4;
  const bytes = key.length - remainder;

  for (let i = 0; i < bytes; i += 4) {
    h1 = mixBlock(
      h1,
      (key.charCodeAt(i) & 0xff) |
        ((key.charCodeAt(i + 1) & 0xff) << 8) |
        ((key.charCodeAt(i + 2) & 0xff) << 16) |
        ((key.charCodeAt(i + 3) & 0xff) << 24)
    );
  }

  let tail = 0;
  switch (remainder) {
    case 3:
      tail ^= (key.charCodeAt(bytes + 2) & 0xff) << 16;
    // falls through
    case 2:
      tail ^= (key.charCodeAt(bytes + 1) & 0xff) << 8;
    // falls through
    case 1: {
      tail ^= key.charCodeAt(bytes) & 0xff;
      let k1 = Math.imul(tail, C1);
      k1 = (k1 << 15) | (k1 >>> 17);
      h1 ^= Math.imul(k1, C2);
    }
  }

  return finalize(h1, key.length);
};

/**
 * 32-bit murmur3 over a sequence of 32-bit words, each read as four
 * little-endian bytes. Hashing `[w]` equals hashing the four-character
 * string spelling `w`'s bytes.
 */
export const murmurHash3Words = (
  words: ArrayLike<number>,
  seed: number = 0
): number => {
  let h1 = seed;
  for (let i = 0; i < words.length; i++) {
    h1 = mixBlock(h1, words[i] | 0);
  }
  return finalize(h1, words.length * 4);
};
