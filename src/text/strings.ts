/**
 * String-array helpers.
 */

import { distinct } from "../generic/query";

const isBlank = (s: string): boolean => s.trim().length === 0;

export const anyEmpty = (xs: readonly string[]): boolean => xs.some((s) => s.length === 0);

export const anyBlank = (xs: readonly string[]): boolean => xs.some(isBlank);

export const trimAll = (xs: readonly string[]): string[] => xs.map((s) => s.trim());

export const removeEmpty = (xs: readonly string[]): string[] => xs.filter((s) => s.length > 0);

export const removeBlank = (xs: readonly string[]): string[] => xs.filter((s) => !isBlank(s));

export const hasDuplicates = (xs: readonly string[]): boolean => new Set(xs).size !== xs.length;

export const toUpperAll = (xs: readonly string[]): string[] => xs.map((s) => s.toUpperCase());

export const toLowerAll = (xs: readonly string[]): string[] => xs.map((s) => s.toLowerCase());

/** Reverses each string by code point, so surrogate pairs stay intact. */
export const reverseEach = (xs: readonly string[]): string[] => xs.map((s) => [...s].reverse().join(""));

function toRegExp(pattern: RegExp | string): RegExp {
  if (typeof pattern === "string") return new RegExp(pattern, "u");
  // drop g/y so repeated test() calls do not carry lastIndex state
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
}

export function filterByPattern(xs: readonly string[], pattern: RegExp | string): string[] {
  const re = toRegExp(pattern);
  return xs.filter((s) => re.test(s));
}

export function countMatching(xs: readonly string[], pattern: RegExp | string): number {
  return filterByPattern(xs, pattern).length;
}

/** Non-overlapping occurrences of `sub` across all strings. */
export function countSubstring(xs: readonly string[], sub: string): number {
  if (sub.length === 0) return 0;
  return xs.reduce((acc, s) => acc + s.split(sub).length - 1, 0);
}

export const replaceInAll = (xs: readonly string[], oldValue: string, newValue: string): string[] =>
  oldValue.length === 0 ? [...xs] : xs.map((s) => s.split(oldValue).join(newValue));

export const allOfLength = (xs: readonly string[], length: number): boolean => xs.every((s) => s.length === length);

/** First string with the greatest length. */
export function longest(xs: readonly string[]): string | undefined {
  return xs.reduce<string | undefined>((best, s) => (best === undefined || s.length > best.length ? s : best), undefined);
}

/** First string with the smallest length. */
export function shortest(xs: readonly string[]): string | undefined {
  return xs.reduce<string | undefined>((best, s) => (best === undefined || s.length < best.length ? s : best), undefined);
}

/** Ordinal (code unit) sort, independent of locale. */
export const sortAlphabetically = (xs: readonly string[]): string[] =>
  [...xs].sort((a, b) => (a === b ? 0 : a < b ? -1 : 1));

export const containsSubstring = (xs: readonly string[], sub: string): boolean => xs.some((s) => s.includes(sub));

export const anyStartsWith = (xs: readonly string[], prefix: string): boolean => xs.some((s) => s.startsWith(prefix));

export const anyEndsWith = (xs: readonly string[], suffix: string): boolean => xs.some((s) => s.endsWith(suffix));

export const joinNonEmpty = (xs: readonly string[], separator: string): string => removeEmpty(xs).join(separator);

/** Collapses every whitespace run to a single space. */
export const normalizeWhitespace = (xs: readonly string[]): string[] => xs.map((s) => s.replace(/\s+/g, " "));

/** First character upper-cased, the rest lower-cased. */
export const capitalizeEach = (xs: readonly string[]): string[] =>
  xs.map((s) => (s.length === 0 ? s : s[0].toUpperCase() + s.slice(1).toLowerCase()));

export const unique = (xs: readonly string[]): string[] => distinct(xs);
