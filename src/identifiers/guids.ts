/**
 * GUID-array helpers.
 *
 * A `Guid` is the canonical lowercase hyphenated form; `parseGuid` accepts
 * the D, N, B and P text formats in either case and produces it. The 16-byte
 * layout is the mixed-endian Microsoft one (COM GUID struct): the first three groups
 * are stored little-endian, the last two as written. The version nibble is
 * the high nibble of byte 7 in that layout.
 */

import { randomUUID } from "node:crypto";
import { InvalidArgumentError, requireNonEmpty } from "../core/errors";
import { bounded, GuidVersion, NonNegativeInt } from "../core/validate";
import type { Guid, GuidFormat } from "../types";

const CANONICAL = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const isCanonical = (s: string): s is Guid => CANONICAL.test(s);

const FORMS: RegExp[] = [
  /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/i,
  /^([0-9a-f]{8})([0-9a-f]{4})([0-9a-f]{4})([0-9a-f]{4})([0-9a-f]{12})$/i,
  /^\{([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\}$/i,
  /^\(([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\)$/i,
];

export function tryParseGuid(text: string): Guid | undefined {
  const trimmed = text.trim();
  for (const re of FORMS) {
    const m = re.exec(trimmed);
    if (m) {
      const canonical = m.slice(1, 6).join("-").toLowerCase();
      return isCanonical(canonical) ? canonical : undefined;
    }
  }
  return undefined;
}

export function parseGuid(text: string): Guid {
  const g = tryParseGuid(text);
  if (g === undefined) throw new InvalidArgumentError(`Not a GUID: "${text}".`, "text");
  return g;
}

export const parseGuids = (texts: readonly string[]): Guid[] => texts.map(parseGuid);

export const isGuid = (text: string): boolean => tryParseGuid(text) !== undefined;

/** True when every string parses as a GUID. */
export const allValid = (texts: readonly string[]): boolean => texts.every(isGuid);

export const EMPTY_GUID: Guid = parseGuid("00000000-0000-0000-0000-000000000000");

/** Random version-4 GUID. */
export const newGuid = (): Guid => parseGuid(randomUUID());

export function randomGuids(length: number, generate: () => Guid = newGuid): Guid[] {
  bounded(NonNegativeInt, length, "length");
  return Array.from({ length }, () => generate());
}

const isEmpty = (g: Guid): boolean => g === EMPTY_GUID;

export const removeEmpty = (gs: readonly Guid[]): Guid[] => gs.filter((g) => !isEmpty(g));
export const anyEmpty = (gs: readonly Guid[]): boolean => gs.some(isEmpty);
export const allEmpty = (gs: readonly Guid[]): boolean => gs.every(isEmpty);
export const allUnique = (gs: readonly Guid[]): boolean => new Set(gs).size === gs.length;

/** GUIDs appearing more than once, in first-seen order. */
export function duplicates(gs: readonly Guid[]): Guid[] {
  const seen = new Set<Guid>();
  const dups = new Set<Guid>();
  for (const g of gs) {
    if (seen.has(g)) dups.add(g);
    seen.add(g);
  }
  return [...dups];
}

export const replaceEmpty = (gs: readonly Guid[], generate: () => Guid = newGuid): Guid[] =>
  gs.map((g) => (isEmpty(g) ? generate() : g));

export function format(g: Guid, fmt: GuidFormat = "D", upper = false): string {
  const text = upper ? g.toUpperCase() : g;
  switch (fmt) {
    case "D":
      return text;
    case "N":
      return text.replace(/-/g, "");
    case "B":
      return `{${text}}`;
    case "P":
      return `(${text})`;
  }
}

export const toStrings = (gs: readonly Guid[], fmt: GuidFormat = "D", upper = false): string[] =>
  gs.map((g) => format(g, fmt, upper));

export const toDelimited = (gs: readonly Guid[], separator = ","): string => gs.join(separator);

// byte positions of each hex pair in the 16-byte layout
const LAYOUT = [3, 2, 1, 0, 5, 4, 7, 6, 8, 9, 10, 11, 12, 13, 14, 15];

export function toBytes(g: Guid): Uint8Array {
  const hex = g.replace(/-/g, "");
  const out = new Uint8Array(16);
  LAYOUT.forEach((pos, i) => {
    out[pos] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  });
  return out;
}

export function fromBytes(bytes: Uint8Array): Guid {
  if (bytes.length !== 16) {
    throw new InvalidArgumentError("A GUID is exactly 16 bytes.", "bytes", { length: bytes.length });
  }
  const hex = LAYOUT.map((pos) => bytes[pos].toString(16).padStart(2, "0")).join("");
  return parseGuid(hex);
}

export const toByteArrays = (gs: readonly Guid[]): Uint8Array[] => gs.map(toBytes);

export const version = (g: Guid): number => (toBytes(g)[7] & 0xf0) >> 4;

export const versions = (gs: readonly Guid[]): number[] => gs.map(version);

export function filterByVersion(gs: readonly Guid[], v: number): Guid[] {
  bounded(GuidVersion, v, "version");
  return gs.filter((g) => version(g) === v);
}

export function groupByVersion(gs: readonly Guid[]): Map<number, Guid[]> {
  const m = new Map<number, Guid[]>();
  for (const g of gs) {
    const v = version(g);
    const bucket = m.get(v) ?? [];
    bucket.push(g);
    m.set(v, bucket);
  }
  return m;
}

/**
 * Canonical text order, which matches comparing the three leading groups as
 * unsigned integers and then the remaining bytes.
 */
export const compareGuids = (a: Guid, b: Guid): number => (a === b ? 0 : a < b ? -1 : 1);

export const sortAscending = (gs: readonly Guid[]): Guid[] => [...gs].sort(compareGuids);

export const sortDescending = (gs: readonly Guid[]): Guid[] => [...gs].sort((a, b) => compareGuids(b, a));

export function min(gs: readonly Guid[]): Guid {
  requireNonEmpty(gs);
  return gs.reduce((a, b) => (compareGuids(b, a) < 0 ? b : a));
}

export function max(gs: readonly Guid[]): Guid {
  requireNonEmpty(gs);
  return gs.reduce((a, b) => (compareGuids(b, a) > 0 ? b : a));
}

export const indexOf = (gs: readonly Guid[], g: Guid): number => gs.indexOf(g);

export const contains = (gs: readonly Guid[], g: Guid): boolean => gs.includes(g);

export const toSet = (gs: readonly Guid[]): Set<Guid> => new Set(gs);
