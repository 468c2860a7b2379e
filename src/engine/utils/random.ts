/**
 * Seeded pseudo-random numbers.
 *
 * The simulator and the stack draw every random decision (loss, jitter,
 * initial sequence numbers) from a source of this shape so a run can be
 * replayed from its seed.
 *
 * @module engine/utils/random
 */

/**
 * A source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Mulberry32 generator: small, fast and deterministic for a given seed.
 */
export function createRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [0, bound).
 */
export function randomInt(random: RandomSource, bound: number): number {
  return Math.floor(random() * bound);
}

/**
 * Random 32-bit initial sequence number.
 */
export function randomSequence(random: RandomSource): number {
  return randomInt(random, 0x100000000) >>> 0;
}

/**
 * Fill a buffer of the given size with pseudo-random bytes.
 */
export function randomBytes(random: RandomSource, size: number): Buffer {
  const bytes = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = randomInt(random, 256);
  }
  return bytes;
}
