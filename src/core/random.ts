/**
 * Random sources. Operations that shuffle or sample take one of these as an
 * optional argument; without it each call builds its own.
 */

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export function defaultRandom(): RandomSource {
  return { next: () => Math.random() };
}

/**
 * Deterministic mulberry32 source, for tests and reproducible sampling.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

/** Integer in [0, bound). */
export function nextInt(rng: RandomSource, bound: number): number {
  return Math.floor(rng.next() * bound);
}
