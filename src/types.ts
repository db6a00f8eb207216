/**
 * arraykit types
 * Shared shapes passed across the group modules.
 */

export type { Comparer } from "./core/compare";
export type { RandomSource } from "./core/random";

export type Predicate<T> = (item: T, index: number) => boolean;

export type Selector<T, R> = (item: T, index: number) => R;

/** Pair of neighbours produced by `sequentialPairs`. */
export type Pair<T> = readonly [T, T];

/**
 * Rectangular row-major grid. `grid[row][column]`.
 */
export type Grid<T> = T[][];

export type Cell = readonly [row: number, column: number];

/** A run of consecutive equal booleans. */
export interface Run {
  start: number;
  length: number;
}

/** 0 = Sunday ... 6 = Saturday, the `Date#getUTCDay()` numbering. */
export const DayOfWeek = {
  Sunday: 0,
  Monday: 1,
  Tuesday: 2,
  Wednesday: 3,
  Thursday: 4,
  Friday: 5,
  Saturday: 6,
} as const;

export type DayOfWeekT = (typeof DayOfWeek)[keyof typeof DayOfWeek];

export type Season = "winter" | "spring" | "summer" | "autumn";

export type Quarter = 1 | 2 | 3 | 4;

/** Text encodings supported by the byte and char helpers. */
export type TextEncoding = "utf8" | "ascii" | "latin1" | "utf16le";

/**
 * GUID text formats:
 * - `D` 00000000-0000-0000-0000-000000000000
 * - `N` 00000000000000000000000000000000
 * - `B` {00000000-0000-0000-0000-000000000000}
 * - `P` (00000000-0000-0000-0000-000000000000)
 */
export type GuidFormat = "D" | "N" | "B" | "P";

/** Canonical lowercase hyphenated GUID text. */
export type Guid = string & { readonly __guid: unique symbol };

export type CharCategory = "letter" | "digit" | "whitespace" | "punctuation" | "symbol" | "other";
