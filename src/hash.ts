const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const rotl = (x: number, r: number): number => (x << r) | (x >>> (32 - r));

const scramble = (k: number): number => Math.imul(rotl(Math.imul(k, C1), 15), C2);

/**
 * 32-bit MurmurHash3 over the UTF-16 code units of `key`, two units per block.
 *
 * @example
 * ```ts
 * murmurHash3("List[T:Number]") === murmurHash3("List[T:Number]"); // true
 * ```
 */
export function murmurHash3(key: string, seed: number = 0): number {
  let h = seed | 0;
  let i = 0;
  for (; i + 1 < key.length; i += 2) {
    h ^= scramble(key.charCodeAt(i) | (key.charCodeAt(i + 1) << 16));
    h = (Math.imul(rotl(h, 13), 5) + 0xe6546b64) | 0;
  }
  if (i < key.length) h ^= scramble(key.charCodeAt(i));

  // Length in bytes.
  h ^= key.length * 2;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}
