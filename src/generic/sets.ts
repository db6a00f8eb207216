// Set-like operations. Results are distinct, in first-seen order, with
// equality as in `sameValue` (Dates by instant).

import { valueKeyer } from "../core/compare";
import { distinct } from "./query";

function keep<T>(a: readonly T[], b: readonly T[], inB: boolean): T[] {
  const key = valueKeyer();
  const other = new Set(b.map(key));
  return distinct(a).filter((x) => other.has(key(x)) === inB);
}

export const intersect = <T>(a: readonly T[], b: readonly T[]): T[] => keep(a, b, true);

export const union = <T>(a: readonly T[], b: readonly T[]): T[] => distinct([...a, ...b]);

export const except = <T>(a: readonly T[], b: readonly T[]): T[] => keep(a, b, false);

export const toSet = <T>(xs: readonly T[]): Set<T> => new Set(distinct(xs));
