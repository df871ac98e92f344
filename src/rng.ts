/** Random sources for food placement and seeded sessions. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Create a deterministic xorshift32 generator.
 * @param seed - Seed value; non-finite or zero seeds fall back to 1.
 * @returns Random source function returning [0,1).
 */
export function createRng(seed: number): RandomSource {
  let state = (Number.isFinite(seed) ? Math.floor(seed) >>> 0 : 0) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Draw a uniform float in [min, max).
 * @param rng - Random source to draw from.
 * @param min - Inclusive lower bound.
 * @param max - Exclusive upper bound.
 * @returns Sampled value.
 */
export function randRange(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}
