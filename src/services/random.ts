import seedrandom from 'seedrandom';

import type { SampleSeed } from '../models/types.js';

export type RandomSource = () => number;

export const SUB_SEED_BOUND = 1_000_000;

/**
 * One seeded stream per sampling run. A `null` seed gives an entropy-seeded
 * stream, so results are only reproducible when a seed is supplied.
 */
export function createRandomSource(seed: SampleSeed): RandomSource {
  const prng = seed === null ? seedrandom(undefined, { entropy: true }) : seedrandom(String(seed));
  return () => prng();
}

/** Integer in `[0, SUB_SEED_BOUND)` taken from the parent stream. */
export function nextSubSeed(source: RandomSource): number {
  return Math.floor(source() * SUB_SEED_BOUND);
}

/**
 * Uniform draw of `count` distinct items, using a generator seeded by
 * `subSeed`. Partial Fisher–Yates over a copy; the input is left untouched.
 */
export function drawWithoutReplacement<T>(items: readonly T[], count: number, subSeed: number): T[] {
  const pool = items.slice();
  const n = Math.min(Math.max(count, 0), pool.length);
  const random = createRandomSource(subSeed);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, n);
}
