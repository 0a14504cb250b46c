/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** mulberry32: small 32-bit generator for reproducible GDP draws. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function resolveRandomSource(seed: number | null): RandomSource {
  return seed === null ? defaultRandom : createSeededRandom(seed);
}
