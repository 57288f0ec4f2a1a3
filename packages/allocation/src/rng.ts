/**
 * Randomness sources for the tier draw.
 *
 * The draw is a plain weighted lottery, not a fair-lottery protocol.
 * Production uses Math.random; tests seed a Mulberry32 generator so a run
 * is reproducible.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

function hashSeed(seed: string): number {
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (hash << 5) - hash + seed.charCodeAt(i);
    hash |= 0;
  }
  return hash >>> 0;
}

/** Mulberry32 generator. Same seed → same sequence. */
export function createSeededRandom(seed: number | string): RandomSource {
  let state = typeof seed === "string" ? hashSeed(seed) : seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Source that replays fixed values (cycled). */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new Error("sequenceRandom: empty sequence");
  let i = 0;
  return {
    next() {
      const v = values[i % values.length] ?? 0;
      i++;
      return v;
    },
  };
}
