/**
 * Descriptive statistics over real-valued arrays.
 *
 * Summaries use population formulas (divisor n). Every summary that needs
 * at least one value throws `InvalidArgumentError` on an empty array.
 */

import { getConfig } from "../core/config";
import { roundHalfEven } from "../core/decimal";
import { OutOfRangeValueError, requireNonEmpty, requireSameLength } from "../core/errors";
import { bounded, NonNegativeInt, Percent } from "../core/validate";

const ascending = (xs: readonly number[]): number[] => [...xs].sort((a, b) => a - b);

export function mean(xs: readonly number[]): number {
  requireNonEmpty(xs);
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}

/**
 * Middle value of the sorted copy; for even lengths the two central values
 * are averaged as `a/2 + b/2` so large magnitudes do not overflow.
 */
export function median(xs: readonly number[]): number {
  requireNonEmpty(xs);
  const s = ascending(xs);
  const mid = Math.floor(s.length / 2);
  return s.length % 2 !== 0 ? s[mid] : s[mid - 1] / 2 + s[mid] / 2;
}

/**
 * Linear-interpolation percentile: `idx = p/100 * (n-1)`, weighted between
 * `floor(idx)` and `ceil(idx)`.
 */
export function percentile(xs: readonly number[], p: number): number {
  requireNonEmpty(xs);
  bounded(Percent, p, "percentile");
  const s = ascending(xs);
  const idx = (p / 100) * (s.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return s[lo];
  const w = idx - lo;
  return s[lo] * (1 - w) + s[hi] * w;
}

export function variance(xs: readonly number[]): number {
  const m = mean(xs);
  return xs.reduce((acc, x) => acc + (x - m) ** 2, 0) / xs.length;
}

export const standardDeviation = (xs: readonly number[]): number => Math.sqrt(variance(xs));

function standardizedMoment(xs: readonly number[], k: number): number {
  const m = mean(xs);
  const sd = standardDeviation(xs);
  if (sd === 0) return 0;
  return xs.reduce((acc, x) => acc + ((x - m) / sd) ** k, 0) / xs.length;
}

export const skewness = (xs: readonly number[]): number => standardizedMoment(xs, 3);

/** Excess kurtosis: 0 for a normal distribution. */
export function kurtosis(xs: readonly number[]): number {
  const k = standardizedMoment(xs, 4);
  return k === 0 ? 0 : k - 3;
}

/** Smallest and largest value in one pass. */
function extent(xs: readonly number[]): { min: number; max: number } {
  requireNonEmpty(xs);
  let min = xs[0];
  let max = xs[0];
  for (const x of xs) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  return { min, max };
}

export function range(xs: readonly number[]): number {
  const { min, max } = extent(xs);
  return max - min;
}

/** Min-max scaling into [0, 1]; all zeros when every value is equal. */
export function normalize(xs: readonly number[]): number[] {
  const { min, max } = extent(xs);
  const span = max - min;
  return span === 0 ? xs.map(() => 0) : xs.map((x) => (x - min) / span);
}

/** z-scores; all zeros when the standard deviation is 0. */
export function standardize(xs: readonly number[]): number[] {
  const m = mean(xs);
  const sd = standardDeviation(xs);
  return sd === 0 ? xs.map(() => 0) : xs.map((x) => (x - m) / sd);
}

/** Pearson correlation coefficient. 0 when either side is constant. */
export function correlation(a: readonly number[], b: readonly number[]): number {
  requireSameLength(a, b);
  const ma = mean(a);
  const mb = mean(b);
  let num = 0;
  let da = 0;
  let db = 0;
  for (let i = 0; i < a.length; i++) {
    num += (a[i] - ma) * (b[i] - mb);
    da += (a[i] - ma) ** 2;
    db += (b[i] - mb) ** 2;
  }
  const den = Math.sqrt(da * db);
  return den === 0 ? 0 : num / den;
}

/**
 * IQR outliers: values below `Q1 - k*IQR` or above `Q3 + k*IQR`, in input
 * order. `k` defaults to the configured outlier factor (1.5).
 */
export function findOutliers(xs: readonly number[], k: number = getConfig().outlierFactor): number[] {
  const q1 = percentile(xs, 25);
  const q3 = percentile(xs, 75);
  const iqr = q3 - q1;
  const lower = q1 - k * iqr;
  const upper = q3 + k * iqr;
  return xs.filter((x) => x < lower || x > upper);
}

/**
 * Centered moving average. Each point averages the values within
 * `floor(window/2)` positions on either side, clipped at the edges.
 */
export function movingAverage(xs: readonly number[], window: number): number[] {
  requireNonEmpty(xs);
  if (!Number.isInteger(window) || window <= 0 || window > xs.length) {
    throw new OutOfRangeValueError(`Window must be between 1 and ${xs.length}.`, "window", { window });
  }
  const half = Math.floor(window / 2);
  return xs.map((_, i) => {
    const start = Math.max(0, i - half);
    const end = Math.min(xs.length - 1, i + half);
    let sum = 0;
    for (let j = start; j <= end; j++) sum += xs[j];
    return sum / (end - start + 1);
  });
}

/** Rounds half-to-even, so 2.5 -> 2 and 3.5 -> 4. */
export function roundAll(xs: readonly number[], decimals: number): number[] {
  bounded(NonNegativeInt, decimals, "decimals");
  return xs.map((x) => (Number.isFinite(x) ? roundHalfEven(x, decimals) : x));
}

export const allFinite = (xs: readonly number[]): boolean => xs.every(Number.isFinite);

export const removeNonFinite = (xs: readonly number[]): number[] => xs.filter(Number.isFinite);

export function cumulativeSum(xs: readonly number[]): number[] {
  let acc = 0;
  return xs.map((x) => (acc += x));
}

/** Successive differences `xs[i] - xs[i-1]`. */
export function diff(xs: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < xs.length; i++) out.push(xs[i] - xs[i - 1]);
  return out;
}

/** Interior indices strictly greater than both neighbours. */
export function localMaxima(xs: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < xs.length - 1; i++) {
    if (xs[i] > xs[i - 1] && xs[i] > xs[i + 1]) out.push(i);
  }
  return out;
}

/** Interior indices strictly smaller than both neighbours. */
export function localMinima(xs: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < xs.length - 1; i++) {
    if (xs[i] < xs[i - 1] && xs[i] < xs[i + 1]) out.push(i);
  }
  return out;
}
