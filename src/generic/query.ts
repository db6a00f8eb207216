/**
 * Read-only queries and aggregation over generic arrays.
 */

import { defaultCompare, sameValue, valueKeyer, type Comparer } from "../core/compare";
import { exactSum, type Decimal } from "../core/decimal";
import { InvalidArgumentError, requireNonEmpty } from "../core/errors";
import type { Predicate, Selector } from "../types";

export const isEmpty = (xs: readonly unknown[]): boolean => xs.length === 0;

/** True when the array holds exactly one distinct value. */
export const allEqual = <T>(xs: readonly T[]): boolean =>
  xs.length > 0 && xs.every((x) => sameValue(x, xs[0]));

export const isUnique = <T>(xs: readonly T[]): boolean => distinct(xs).length === xs.length;

export function isPalindrome<T>(xs: readonly T[]): boolean {
  for (let l = 0, r = xs.length - 1; l < r; l++, r--) {
    if (!sameValue(xs[l], xs[r])) return false;
  }
  return true;
}

export const countOf = <T>(xs: readonly T[], item: T): number =>
  xs.reduce((n, x) => (sameValue(x, item) ? n + 1 : n), 0);

export const contains = <T>(xs: readonly T[], item: T): boolean => xs.some((x) => sameValue(x, item));

export function findIndices<T>(xs: readonly T[], pred: Predicate<T>): number[] {
  const out: number[] = [];
  xs.forEach((x, i) => {
    if (pred(x, i)) out.push(i);
  });
  return out;
}

export function findFirstAndLast<T>(xs: readonly T[], pred: Predicate<T>): { first: T | undefined; last: T | undefined } {
  let first: T | undefined;
  let last: T | undefined;
  let seen = false;
  xs.forEach((x, i) => {
    if (!pred(x, i)) return;
    if (!seen) first = x;
    last = x;
    seen = true;
  });
  return { first, last };
}

export function findOrDefault<T>(xs: readonly T[], pred: Predicate<T>, dflt: T): T {
  const i = xs.findIndex(pred);
  return i === -1 ? dflt : xs[i];
}

/**
 * Count per distinct value, keys in first-seen order. Dates holding the same
 * instant count as one value, keyed by the first of them.
 */
export function frequency<T>(xs: Iterable<T>): Map<T, number> {
  const key = valueKeyer();
  const counts = new Map<unknown, { item: T; n: number }>();
  for (const x of xs) {
    const k = key(x);
    const entry = counts.get(k);
    if (entry) entry.n++;
    else counts.set(k, { item: x, n: 1 });
  }
  return new Map([...counts.values()].map(({ item, n }): [T, number] => [item, n]));
}

/**
 * Highest-count entry; ties go to the key seen first.
 */
export function topEntry<T>(counts: Map<T, number>): [T, number] | undefined {
  let best: [T, number] | undefined;
  for (const [k, n] of counts) {
    if (best === undefined || n > best[1]) best = [k, n];
  }
  return best;
}

export function mostCommon<T>(xs: readonly T[]): T {
  const top = topEntry(frequency(xs));
  if (top === undefined) throw new InvalidArgumentError("Array is empty.", "arr");
  return top[0];
}

/** Values appearing more than once, in first-seen order. */
export const duplicates = <T>(xs: readonly T[]): T[] =>
  [...frequency(xs)].filter(([, n]) => n > 1).map(([k]) => k);

export function duplicateIndices<T>(xs: readonly T[]): number[] {
  const key = valueKeyer();
  const dups = new Set(duplicates(xs).map(key));
  return findIndices(xs, (x) => dups.has(key(x)));
}

/** First occurrence of each value; equality as in `sameValue`. */
export const distinct = <T>(xs: readonly T[]): T[] => distinctBy(xs, (x) => x);

export function distinctBy<T, K>(xs: readonly T[], key: Selector<T, K>): T[] {
  const normalize = valueKeyer();
  const seen = new Set<unknown>();
  return xs.filter((x, i) => {
    const k = normalize(key(x, i));
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

/** First element with the largest key. */
export function maxBy<T, K>(xs: readonly T[], key: (x: T) => K, cmp: Comparer<K> = defaultCompare): T | undefined {
  let best: { item: T; key: K } | undefined;
  for (const x of xs) {
    const k = key(x);
    if (best === undefined || cmp(k, best.key) > 0) best = { item: x, key: k };
  }
  return best?.item;
}

/** First element with the smallest key. */
export function minBy<T, K>(xs: readonly T[], key: (x: T) => K, cmp: Comparer<K> = defaultCompare): T | undefined {
  return maxBy(xs, key, (a, b) => cmp(b, a));
}

/** Exact decimal sum of the selected values. */
export const sumBy = <T>(xs: readonly T[], f: (x: T) => number | string): Decimal => exactSum(xs.map(f));

export function averageBy<T>(xs: readonly T[], f: (x: T) => number): number {
  requireNonEmpty(xs);
  return xs.reduce((acc, x) => acc + f(x), 0) / xs.length;
}

export function foldLeft<T>(xs: readonly T[], f: (acc: T, x: T) => T): T {
  requireNonEmpty(xs);
  return xs.slice(1).reduce(f, xs[0]);
}

/** Folds from the last element towards the first. */
export function foldRight<T>(xs: readonly T[], f: (acc: T, x: T) => T): T {
  requireNonEmpty(xs);
  return xs.slice(0, -1).reduceRight(f, xs[xs.length - 1]);
}

/**
 * Groups runs of consecutive elements sharing a key. A key that reappears
 * later starts a new group.
 */
export function groupSequential<T, K>(xs: readonly T[], key: Selector<T, K>): { key: K; items: T[] }[] {
  const out: { key: K; items: T[] }[] = [];
  xs.forEach((x, i) => {
    const k = key(x, i);
    const last = out[out.length - 1];
    if (last && sameValue(last.key, k)) last.items.push(x);
    else out.push({ key: k, items: [x] });
  });
  return out;
}

export const joinToString = <T>(xs: readonly T[], separator = ","): string => xs.map((x) => String(x)).join(separator);

export const removeNullish = <T>(xs: readonly T[]): NonNullable<T>[] =>
  xs.filter((x): x is NonNullable<T> => x !== null && x !== undefined);

export const anyNullish = (xs: readonly unknown[]): boolean => xs.some((x) => x === null || x === undefined);
