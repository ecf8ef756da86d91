/**
 * Uniform [0, 1) draws for the random surfer.
 *
 * Anything of the shape `() => number` works; `createSeededRandom` gives a
 * reproducible stream so simulations can be replayed in tests.
 */

export type RandomSource = () => number;

const LCG_MULTIPLIER = 1103515245;
const LCG_INCREMENT = 12345;
const LCG_MODULUS = 0x80000000;

/** 31-bit linear congruential generator. Not suitable for anything secret. */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed)) {
    throw new RangeError(`Seed must be an integer, got ${seed}`);
  }

  let s = seed & 0x7fffffff;
  return () => {
    s = (Math.imul(s, LCG_MULTIPLIER) + LCG_INCREMENT) & 0x7fffffff;
    return s / LCG_MODULUS;
  };
}
