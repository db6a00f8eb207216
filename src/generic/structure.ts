/**
 * Structural helpers: insert, remove, rotate, chunk, slice and friends.
 * Everything returns a new array except `fill` and in-range `safeSet`.
 */

import { sameValue } from "../core/compare";
import { IndexOutOfRangeError, InvalidArgumentError, requireSameLength } from "../core/errors";
import { bounded, checkIndex, NonNegativeInt, PositiveInt } from "../core/validate";
import type { Pair, Predicate } from "../types";

export const append = <T>(xs: readonly T[], item: T): T[] => [...xs, item];

export const appendAll = <T>(xs: readonly T[], ...items: T[]): T[] => [...xs, ...items];

export function insertAt<T>(xs: readonly T[], index: number, item: T): T[] {
  checkIndex(index, xs.length, "index", true);
  return [...xs.slice(0, index), item, ...xs.slice(index)];
}

export function removeAt<T>(xs: readonly T[], index: number): T[] {
  checkIndex(index, xs.length);
  return xs.filter((_, i) => i !== index);
}

/**
 * Copy into an array of `size`, truncating or padding with `pad`.
 */
export function resize<T>(xs: readonly T[], size: number, pad?: T): (T | undefined)[] {
  bounded(NonNegativeInt, size, "size");
  const out: (T | undefined)[] = xs.slice(0, size);
  while (out.length < size) out.push(pad);
  return out;
}

export const head = <T>(xs: readonly T[]): T | undefined => xs[0];

export const tail = <T>(xs: readonly T[]): T[] => xs.slice(1);

export function firstN<T>(xs: readonly T[], n: number): T[] {
  return n <= 0 ? [] : xs.slice(0, n);
}

export function lastN<T>(xs: readonly T[], n: number): T[] {
  return n <= 0 ? [] : xs.slice(Math.max(0, xs.length - n));
}

export const reverse = <T>(xs: readonly T[]): T[] => [...xs].reverse();

/** Overwrites every slot of `xs` in place. */
export function fill<T>(xs: T[], value: T): void {
  for (let i = 0; i < xs.length; i++) xs[i] = value;
}

export function safeGet<T>(xs: readonly T[], index: number, dflt: T): T;
export function safeGet<T>(xs: readonly T[], index: number): T | undefined;
export function safeGet<T>(xs: readonly T[], index: number, dflt?: T): T | undefined {
  return Number.isInteger(index) && index >= 0 && index < xs.length ? xs[index] : dflt;
}

/**
 * Sets `xs[index]` in place when the index is in range. Past the end, returns
 * a grown copy (holes filled with `undefined`) with the value at `index`.
 */
export function safeSet<T>(xs: (T | undefined)[], index: number, value: T): (T | undefined)[] {
  if (!Number.isInteger(index) || index < 0) {
    throw new IndexOutOfRangeError("Index cannot be negative.", "index", { index });
  }
  const target = index < xs.length ? xs : resize(xs, index + 1);
  target[index] = value;
  return target;
}

export function replaceAll<T>(xs: readonly T[], oldValue: T, newValue: T): T[] {
  return xs.map((x) => (sameValue(x, oldValue) ? newValue : x));
}

function rotationOffset(length: number, positions: number): number {
  bounded(NonNegativeInt, positions, "positions");
  return positions % length;
}

export function rotateLeft<T>(xs: readonly T[], positions: number): T[] {
  if (xs.length === 0) return [];
  const k = rotationOffset(xs.length, positions);
  return [...xs.slice(k), ...xs.slice(0, k)];
}

export function rotateRight<T>(xs: readonly T[], positions: number): T[] {
  if (xs.length === 0) return [];
  const k = rotationOffset(xs.length, positions);
  return [...xs.slice(xs.length - k), ...xs.slice(0, xs.length - k)];
}

export function chunk<T>(xs: readonly T[], size: number): T[][] {
  bounded(PositiveInt, size, "size");
  const out: T[][] = [];
  for (let i = 0; i < xs.length; i += size) out.push(xs.slice(i, i + size));
  return out;
}

/** Lazy `chunk`. */
export function* batches<T>(xs: readonly T[], size: number): Generator<T[]> {
  bounded(PositiveInt, size, "size");
  for (let i = 0; i < xs.length; i += size) yield xs.slice(i, i + size);
}

/**
 * Half-open `[start, end)`. `start` must index an element; `end`, when given,
 * must be greater than `start` and at most `xs.length`.
 */
export function slice<T>(xs: readonly T[], start: number, end?: number): T[] {
  if (!Number.isInteger(start) || start < 0 || start >= xs.length) {
    throw new IndexOutOfRangeError(`Start ${start} is outside [0, ${xs.length - 1}].`, "start", { start, length: xs.length });
  }
  if (end !== undefined && end <= start) {
    throw new InvalidArgumentError("End must be greater than start.", "end", { start, end });
  }
  if (end !== undefined && end > xs.length) {
    throw new IndexOutOfRangeError(`End ${end} is past the array length ${xs.length}.`, "end", { end, length: xs.length });
  }
  return xs.slice(start, end ?? xs.length);
}

/** Alternates elements of `a` and `b`; the longer array's rest is appended. */
export function interleave<T>(a: readonly T[], b: readonly T[]): T[] {
  const out: T[] = [];
  const n = Math.max(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (i < a.length) out.push(a[i]);
    if (i < b.length) out.push(b[i]);
  }
  return out;
}

/**
 * Splits before every element that satisfies `startsSegment`. A matching
 * first element does not produce a leading empty segment.
 */
export function segment<T>(xs: readonly T[], startsSegment: Predicate<T>): T[][] {
  const out: T[][] = [];
  let current: T[] = [];
  xs.forEach((x, i) => {
    if (startsSegment(x, i) && current.length > 0) {
      out.push(current);
      current = [];
    }
    current.push(x);
  });
  if (current.length > 0) out.push(current);
  return out;
}

export function* slidingWindow<T>(xs: readonly T[], size: number): Generator<T[]> {
  bounded(PositiveInt, size, "size");
  for (let i = 0; i + size <= xs.length; i++) yield xs.slice(i, i + size);
}

export const flatten = <T>(xss: readonly (readonly T[])[]): T[] => xss.flatMap((xs) => [...xs]);

export function* sequentialPairs<T>(xs: readonly T[]): Generator<Pair<T>> {
  for (let i = 0; i < xs.length - 1; i++) yield [xs[i], xs[i + 1]];
}

export function partition<T>(xs: readonly T[], pred: Predicate<T>): [matching: T[], rest: T[]] {
  const matching: T[] = [];
  const rest: T[] = [];
  xs.forEach((x, i) => (pred(x, i) ? matching : rest).push(x));
  return [matching, rest];
}

export function takeWhile<T>(xs: readonly T[], pred: Predicate<T>): T[] {
  const i = xs.findIndex((x, j) => !pred(x, j));
  return i === -1 ? [...xs] : xs.slice(0, i);
}

export function skipWhile<T>(xs: readonly T[], pred: Predicate<T>): T[] {
  const i = xs.findIndex((x, j) => !pred(x, j));
  return i === -1 ? [] : xs.slice(i);
}

/** Pairs up to the shorter length. */
export function zipWith<A, B, R>(a: readonly A[], b: readonly B[], f: (x: A, y: B, index: number) => R): R[] {
  const n = Math.min(a.length, b.length);
  const out: R[] = [];
  for (let i = 0; i < n; i++) out.push(f(a[i], b[i], i));
  return out;
}

export function zipStrict<A, B>(a: readonly A[], b: readonly B[]): [A, B][] {
  requireSameLength(a, b);
  return zipWith(a, b, (x, y): [A, B] => [x, y]);
}

export const deepCopy = <T>(xs: readonly T[]): T[] => structuredClone([...xs]);
