/**
 * Character-array helpers. A "char" is a single UTF-16 code unit held in a
 * one-character string; `chars()` splits a string that way.
 */

import { InvalidArgumentError } from "../core/errors";
import { frequency, topEntry } from "../generic/query";
import type { CharCategory, TextEncoding } from "../types";

const VOWELS = new Set("aeiouAEIOU");

const LETTER = /^\p{L}$/u;
const DIGIT = /^\p{Nd}$/u;
const UPPER = /^\p{Lu}$/u;
const LOWER = /^\p{Ll}$/u;
const WHITESPACE = /^\s$/u;
const PUNCTUATION = /^\p{P}$/u;
const SYMBOL = /^\p{S}$/u;

export const isLetter = (c: string): boolean => LETTER.test(c);
export const isDigit = (c: string): boolean => DIGIT.test(c);
export const isWhitespace = (c: string): boolean => WHITESPACE.test(c);

export const chars = (s: string): string[] => s.split("");

export const asString = (cs: readonly string[]): string => cs.join("");

const count = (cs: readonly string[], f: (c: string) => boolean): number =>
  cs.reduce((n, c) => (f(c) ? n + 1 : n), 0);

export const countVowels = (cs: readonly string[]): number => count(cs, (c) => VOWELS.has(c));
export const countConsonants = (cs: readonly string[]): number => count(cs, (c) => isLetter(c) && !VOWELS.has(c));
export const countDigits = (cs: readonly string[]): number => count(cs, isDigit);
export const countLetters = (cs: readonly string[]): number => count(cs, isLetter);
export const countUppercase = (cs: readonly string[]): number => count(cs, (c) => UPPER.test(c));
export const countLowercase = (cs: readonly string[]): number => count(cs, (c) => LOWER.test(c));
export const countWhitespace = (cs: readonly string[]): number => count(cs, isWhitespace);
export const countPunctuation = (cs: readonly string[]): number => count(cs, (c) => PUNCTUATION.test(c));

// single code unit in, single code unit out ("ß" upper-cases to "SS", kept as is)
const upper1 = (c: string): string => {
  const u = c.toUpperCase();
  return u.length === c.length ? u : c;
};
const lower1 = (c: string): string => {
  const l = c.toLowerCase();
  return l.length === c.length ? l : c;
};

export const toUpper = (cs: readonly string[]): string[] => cs.map(upper1);
export const toLower = (cs: readonly string[]): string[] => cs.map(lower1);

export const removeWhitespace = (cs: readonly string[]): string[] => cs.filter((c) => !isWhitespace(c));
export const lettersOnly = (cs: readonly string[]): string[] => cs.filter(isLetter);
export const digitsOnly = (cs: readonly string[]): string[] => cs.filter(isDigit);
export const alphanumericOnly = (cs: readonly string[]): string[] => cs.filter((c) => isLetter(c) || isDigit(c));

export function mostFrequent(cs: readonly string[]): string {
  const top = topEntry(frequency(cs));
  if (top === undefined) throw new InvalidArgumentError("Array is empty.", "arr");
  return top[0];
}

export const charFrequency = (cs: readonly string[]): Map<string, number> => frequency(cs);

export function capitalizeFirst(cs: readonly string[]): string[] {
  const out = [...cs];
  if (out.length > 0 && isLetter(out[0])) out[0] = upper1(out[0]);
  return out;
}

/**
 * Upper-cases the first letter after whitespace (or at the start) and
 * lower-cases every other letter. Non-letters pass through and do not reset
 * the word boundary.
 */
export function toTitleCase(cs: readonly string[]): string[] {
  let startOfWord = true;
  return cs.map((c) => {
    if (isWhitespace(c)) {
      startOfWord = true;
      return c;
    }
    if (!isLetter(c)) return c;
    const out = startOfWord ? upper1(c) : lower1(c);
    startOfWord = false;
    return out;
  });
}

export const isAsciiOnly = (cs: readonly string[]): boolean => cs.every((c) => c.charCodeAt(0) <= 127);

/** ASCII maps anything past 0x7F to "?". */
export function encode(cs: readonly string[], encoding: TextEncoding = "utf8"): Uint8Array {
  const text = encoding === "ascii" ? cs.map((c) => (c.charCodeAt(0) > 127 ? "?" : c)).join("") : asString(cs);
  return new Uint8Array(Buffer.from(text, encoding));
}

/** Ordinal sort by code unit. */
export const sortOrdinal = (cs: readonly string[]): string[] =>
  [...cs].sort((a, b) => a.charCodeAt(0) - b.charCodeAt(0));

export function category(c: string): CharCategory {
  if (isLetter(c)) return "letter";
  if (isDigit(c)) return "digit";
  if (isWhitespace(c)) return "whitespace";
  if (PUNCTUATION.test(c)) return "punctuation";
  if (SYMBOL.test(c)) return "symbol";
  return "other";
}

export function groupByCategory(cs: readonly string[]): Map<CharCategory, string[]> {
  const m = new Map<CharCategory, string[]>();
  for (const c of cs) {
    const k = category(c);
    const bucket = m.get(k) ?? [];
    bucket.push(c);
    m.set(k, bucket);
  }
  return m;
}
