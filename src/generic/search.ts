import { defaultCompare, type Comparer } from "../core/compare";

/**
 * Classic bounded binary search over an array sorted under `cmp`.
 * Returns the index of an element comparing equal to `target`, or -1.
 * Sortedness is the caller's responsibility and is not checked.
 */
export function binarySearch<T>(sorted: readonly T[], target: T, cmp: Comparer<T> = defaultCompare): number {
  let low = 0;
  let high = sorted.length - 1;
  while (low <= high) {
    const mid = low + Math.floor((high - low) / 2);
    const c = cmp(sorted[mid], target);
    if (c === 0) return mid;
    if (c < 0) low = mid + 1;
    else high = mid - 1;
  }
  return -1;
}

export function isSorted<T>(xs: readonly T[], cmp: Comparer<T> = defaultCompare): boolean {
  for (let i = 1; i < xs.length; i++) {
    if (cmp(xs[i - 1], xs[i]) > 0) return false;
  }
  return true;
}

/**
 * Merges two sorted arrays. On ties the element from `a` comes first.
 */
export function mergeSorted<T>(a: readonly T[], b: readonly T[], cmp: Comparer<T> = defaultCompare): T[] {
  const out: T[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (cmp(a[i], b[j]) <= 0) out.push(a[i++]);
    else out.push(b[j++]);
  }
  while (i < a.length) out.push(a[i++]);
  while (j < b.length) out.push(b[j++]);
  return out;
}

/** Stable sorted copy. */
export const sortedCopy = <T>(xs: readonly T[], cmp: Comparer<T> = defaultCompare): T[] => [...xs].sort(cmp);
