// Integer-specific helpers. Inputs must be safe integers.

import { InvalidArgumentError, requireNonEmpty } from "../core/errors";
import { bounded, Percent } from "../core/validate";
import { frequency } from "../generic/query";
import { standardDeviation as sd, variance as populationVariance } from "./stats";

function requireIntegers(xs: readonly number[]): void {
  const bad = xs.findIndex((x) => !Number.isSafeInteger(x));
  if (bad !== -1) {
    throw new InvalidArgumentError(`Element at ${bad} is not a safe integer.`, "arr", { index: bad, value: xs[bad] });
  }
}

export function sumEven(xs: readonly number[]): number {
  requireIntegers(xs);
  return xs.reduce((acc, x) => (x % 2 === 0 ? acc + x : acc), 0);
}

export function sumOdd(xs: readonly number[]): number {
  requireIntegers(xs);
  return xs.reduce((acc, x) => (x % 2 !== 0 ? acc + x : acc), 0);
}

export function isPrime(n: number): boolean {
  if (!Number.isSafeInteger(n) || n < 2) return false;
  for (let i = 2; i * i <= n; i++) {
    if (n % i === 0) return false;
  }
  return true;
}

export function primes(xs: readonly number[]): number[] {
  requireIntegers(xs);
  return xs.filter(isPrime);
}

export function averageIgnoringZero(xs: readonly number[]): number {
  requireIntegers(xs);
  const nonZero = xs.filter((x) => x !== 0);
  if (nonZero.length === 0) {
    throw new InvalidArgumentError("Array has no non-zero elements.", "arr");
  }
  return nonZero.reduce((a, b) => a + b, 0) / nonZero.length;
}

/** Exact product; 1n for an empty array. */
export function product(xs: readonly number[]): bigint {
  requireIntegers(xs);
  return xs.reduce((acc, x) => acc * BigInt(x), 1n);
}

export function isStrictlyIncreasing(xs: readonly number[]): boolean {
  for (let i = 1; i < xs.length; i++) if (xs[i - 1] >= xs[i]) return false;
  return true;
}

export function isStrictlyDecreasing(xs: readonly number[]): boolean {
  for (let i = 1; i < xs.length; i++) if (xs[i - 1] <= xs[i]) return false;
  return true;
}

/**
 * Distinct values by descending frequency; equal counts keep first-seen order.
 */
export function modes(xs: readonly number[]): number[] {
  return [...frequency(xs)].sort((a, b) => b[1] - a[1]).map(([v]) => v);
}

/**
 * Nearest-rank percentile: the value at `ceil(p/100 * n) - 1` once sorted
 * (index clamped to 0, so p = 0 gives the minimum).
 *
 * Sorts `xs` ascending in place.
 */
export function nearestRankPercentile(xs: number[], p: number): number {
  requireNonEmpty(xs);
  bounded(Percent, p, "percentile");
  xs.sort((a, b) => a - b);
  const idx = Math.max(0, Math.ceil((p / 100) * xs.length) - 1);
  return xs[idx];
}

/** Sum of `|xs[i] - xs[j]|` over all pairs `i < j`. */
export function sumAbsoluteDifferences(xs: readonly number[]): number {
  requireIntegers(xs);
  let total = 0;
  for (let i = 0; i < xs.length; i++) {
    for (let j = i + 1; j < xs.length; j++) total += Math.abs(xs[i] - xs[j]);
  }
  return total;
}

export const frequencyMap = (xs: readonly number[]): Map<number, number> => frequency(xs);

export function variance(xs: readonly number[]): number {
  requireIntegers(xs);
  return populationVariance(xs);
}

export function standardDeviation(xs: readonly number[]): number {
  requireIntegers(xs);
  return sd(xs);
}
