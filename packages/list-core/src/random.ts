// packages/list-core/src/random.ts
//
// Random sources for sampling. A RandomSource returns a float in [0, 1),
// the same contract as Math.random, so tests can script exact draws and the
// CLI can replay a sample from a fixed seed.

import seedrandom from 'seedrandom';

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Deterministic source: the same seed always yields the same sequence. */
export function seededRandom(seed: string): RandomSource {
  const rng = seedrandom(seed);
  return () => rng();
}

/**
 * randomInt draws a uniform integer in [0, maxInclusive].
 *
 * Example:
 *   randomInt(() => 0.5, 3) → 2
 */
export function randomInt(random: RandomSource, maxInclusive: number): number {
  return Math.floor(random() * (maxInclusive + 1));
}
