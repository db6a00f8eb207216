import { requireSameLength } from "../core/errors";
import type { Run } from "../types";

export const countTrue = (xs: readonly boolean[]): number => xs.filter(Boolean).length;
export const countFalse = (xs: readonly boolean[]): number => xs.length - countTrue(xs);

export const allTrue = (xs: readonly boolean[]): boolean => xs.every((x) => x);
export const allFalse = (xs: readonly boolean[]): boolean => xs.every((x) => !x);
export const anyTrue = (xs: readonly boolean[]): boolean => xs.some((x) => x);
export const anyFalse = (xs: readonly boolean[]): boolean => xs.some((x) => !x);

export const invert = (xs: readonly boolean[]): boolean[] => xs.map((x) => !x);

function pairwise(a: readonly boolean[], b: readonly boolean[], f: (x: boolean, y: boolean) => boolean): boolean[] {
  requireSameLength(a, b);
  return a.map((x, i) => f(x, b[i]));
}

export const and = (a: readonly boolean[], b: readonly boolean[]): boolean[] => pairwise(a, b, (x, y) => x && y);
export const or = (a: readonly boolean[], b: readonly boolean[]): boolean[] => pairwise(a, b, (x, y) => x || y);
export const xor = (a: readonly boolean[], b: readonly boolean[]): boolean[] => pairwise(a, b, (x, y) => x !== y);

function indicesOf(xs: readonly boolean[], value: boolean): number[] {
  const out: number[] = [];
  xs.forEach((x, i) => {
    if (x === value) out.push(i);
  });
  return out;
}

export const trueIndices = (xs: readonly boolean[]): number[] => indicesOf(xs, true);
export const falseIndices = (xs: readonly boolean[]): number[] => indicesOf(xs, false);

/** Share of `true` values, 0-100. 0 for an empty array. */
export const truePercentage = (xs: readonly boolean[]): number =>
  xs.length === 0 ? 0 : (countTrue(xs) / xs.length) * 100;

export const falsePercentage = (xs: readonly boolean[]): number =>
  xs.length === 0 ? 0 : (countFalse(xs) / xs.length) * 100;

export const firstTrue = (xs: readonly boolean[]): number => xs.indexOf(true);
export const lastTrue = (xs: readonly boolean[]): number => xs.lastIndexOf(true);
export const firstFalse = (xs: readonly boolean[]): number => xs.indexOf(false);
export const lastFalse = (xs: readonly boolean[]): number => xs.lastIndexOf(false);

export const toBinaryString = (xs: readonly boolean[]): string => xs.map((x) => (x ? "1" : "0")).join("");

export const toBits = (xs: readonly boolean[]): number[] => xs.map((x) => (x ? 1 : 0));

function runsOf(xs: readonly boolean[], value: boolean): Run[] {
  const runs: Run[] = [];
  let start = -1;
  xs.forEach((x, i) => {
    if (x === value) {
      if (start === -1) start = i;
    } else if (start !== -1) {
      runs.push({ start, length: i - start });
      start = -1;
    }
  });
  if (start !== -1) runs.push({ start, length: xs.length - start });
  return runs;
}

export const trueRuns = (xs: readonly boolean[]): Run[] => runsOf(xs, true);
export const falseRuns = (xs: readonly boolean[]): Run[] => runsOf(xs, false);

function longest(runs: Run[]): Run {
  return runs.reduce<Run>((best, r) => (r.length > best.length ? r : best), { start: -1, length: 0 });
}

/** `{ start: -1, length: 0 }` when there is no `true`. Ties go to the first run. */
export const longestTrueRun = (xs: readonly boolean[]): Run => longest(trueRuns(xs));
export const longestFalseRun = (xs: readonly boolean[]): Run => longest(falseRuns(xs));
