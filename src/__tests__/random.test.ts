import { describe, expect, it } from 'vitest';

import { createRandomSource, drawWithoutReplacement, nextSubSeed, SUB_SEED_BOUND } from '../services/random.js';

describe('createRandomSource', () => {
  it('replays the same stream for the same seed', () => {
    const a = createRandomSource(42);
    const b = createRandomSource(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('treats numeric and string seeds with the same text alike', () => {
    expect(createRandomSource(7)()).toBe(createRandomSource('7')());
  });
});

describe('nextSubSeed', () => {
  it('returns an integer below the bound', () => {
    const source = createRandomSource('sub-seeds');
    for (let i = 0; i < 100; i++) {
      const subSeed = nextSubSeed(source);
      expect(Number.isInteger(subSeed)).toBe(true);
      expect(subSeed).toBeGreaterThanOrEqual(0);
      expect(subSeed).toBeLessThan(SUB_SEED_BOUND);
    }
  });
});

describe('drawWithoutReplacement', () => {
  const items = Array.from({ length: 20 }, (_, index) => index);

  it('draws distinct items from the input', () => {
    const drawn = drawWithoutReplacement(items, 8, 123);
    expect(drawn).toHaveLength(8);
    expect(new Set(drawn).size).toBe(8);
    expect(drawn.every((item) => items.includes(item))).toBe(true);
  });

  it('is reproducible for a sub-seed and leaves the input untouched', () => {
    const copy = items.slice();
    expect(drawWithoutReplacement(items, 5, 99)).toEqual(drawWithoutReplacement(items, 5, 99));
    expect(items).toEqual(copy);
  });

  it('caps the draw at the pool size', () => {
    const drawn = drawWithoutReplacement(['a', 'b', 'c'], 10, 1);
    expect([...drawn].sort()).toEqual(['a', 'b', 'c']);
    expect(drawWithoutReplacement(['a', 'b'], 0, 1)).toEqual([]);
  });
});
