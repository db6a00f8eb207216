import { defaultRandom, nextInt, type RandomSource } from "../core/random";
import { bounded, NonNegativeInt } from "../core/validate";

/** Fisher-Yates shuffle of a copy. */
export function shuffle<T>(xs: readonly T[], rng: RandomSource = defaultRandom()): T[] {
  const out = [...xs];
  for (let i = out.length - 1; i > 0; i--) {
    const j = nextInt(rng, i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * `size` distinct positions drawn without replacement. A size larger than
 * the array returns a shuffled copy of the whole array.
 */
export function sample<T>(xs: readonly T[], size: number, rng: RandomSource = defaultRandom()): T[] {
  bounded(NonNegativeInt, size, "size");
  return shuffle(xs, rng).slice(0, size);
}
