import { getConfig } from "../core/config";
import { log } from "../core/log";

function warnIfLarge(op: string, n: number, results: string): void {
  if (n > getConfig().combinatoricsWarnThreshold) {
    log.warn(`${op} over ${n} elements yields ${results} results`);
  }
}

/**
 * Every ordering of `xs` (n! of them), generated lazily with Heap's
 * algorithm over a private copy. Each yielded array is a fresh copy.
 * There is no size guard: bounding n is up to the caller.
 */
export function* permutations<T>(xs: readonly T[]): Generator<T[]> {
  const n = xs.length;
  warnIfLarge("permutations", n, `${n}!`);
  const a = [...xs];
  yield [...a];
  const c = new Array<number>(n).fill(0);
  let i = 1;
  while (i < n) {
    if (c[i] < i) {
      const j = i % 2 === 0 ? 0 : c[i];
      [a[j], a[i]] = [a[i], a[j]];
      yield [...a];
      c[i] += 1;
      i = 1;
    } else {
      c[i] = 0;
      i += 1;
    }
  }
}

/**
 * Every subset of `xs` (2^n of them). Subset `m` holds element `j` iff bit
 * `j` of `m` is set, so the empty subset comes first.
 */
export function* subsets<T>(xs: readonly T[]): Generator<T[]> {
  const n = xs.length;
  warnIfLarge("subsets", n, `2^${n}`);
  const total = 2 ** n;
  for (let m = 0; m < total; m++) {
    yield xs.filter((_, j) => Math.floor(m / 2 ** j) % 2 === 1);
  }
}
