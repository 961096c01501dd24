import type { RandomSource } from './types.js';

/**
 * Seeded PRNG (mulberry32). Same seed → same sequence, values in [0, 1).
 */
export function createRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seed for an independent sub-stream, e.g. one per match of a tournament. */
export function deriveSeed(baseSeed: number, index: number): number {
  return (baseSeed + Math.imul(index + 1, 0x9e3779b1)) >>> 0;
}
