import { describe, expect, it } from 'vitest';
import { createRandom, deriveSeed } from '../src/random.js';

function take(random: () => number, n: number): number[] {
  return Array.from({ length: n }, () => random());
}

describe('createRandom', () => {
  it('produces the same sequence for the same seed', () => {
    expect(take(createRandom(42), 20)).toEqual(take(createRandom(42), 20));
  });

  it('produces different sequences for different seeds', () => {
    expect(take(createRandom(1), 5)).not.toEqual(take(createRandom(2), 5));
  });

  it('stays within [0, 1)', () => {
    for (const value of take(createRandom(7), 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('deriveSeed', () => {
  it('is deterministic', () => {
    expect(deriveSeed(42, 3)).toBe(deriveSeed(42, 3));
  });

  it('gives each index its own seed', () => {
    const seeds = new Set(Array.from({ length: 7 }, (_, i) => deriveSeed(42, i)));
    expect(seeds.size).toBe(7);
  });

  it('returns an unsigned 32-bit integer', () => {
    const seed = deriveSeed(-1, 0);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThan(2 ** 32);
  });
});
