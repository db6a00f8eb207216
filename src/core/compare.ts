export type Comparer<T> = (a: T, b: T) => number;

/**
 * Natural ordering for numbers, bigints, booleans and dates. Anything else
 * compares by its string form, UTF-16 code unit order (ordinal), not locale.
 */
export function defaultCompare<T>(a: T, b: T): number {
  const x: unknown = a instanceof Date ? a.getTime() : a;
  const y: unknown = b instanceof Date ? b.getTime() : b;
  if (x === y) return 0;
  if (typeof x === "number" && typeof y === "number") return x < y ? -1 : 1;
  if (typeof x === "bigint" && typeof y === "bigint") return x < y ? -1 : 1;
  if (typeof x === "boolean" && typeof y === "boolean") return x ? 1 : -1;
  const sx = String(x);
  const sy = String(y);
  if (sx === sy) return 0;
  return sx < sy ? -1 : 1;
}

export function reverseCompare<T>(cmp: Comparer<T>): Comparer<T> {
  return (a, b) => cmp(b, a);
}

export function compareBy<T, K>(key: (x: T) => K, cmp: Comparer<K> = defaultCompare): Comparer<T> {
  return (a, b) => cmp(key(a), key(b));
}

/**
 * Element equality used by the "equatable" helpers: SameValueZero, with
 * dates compared by instant.
 */
export function sameValue<T>(a: T, b: T): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b || (a !== a && b !== b);
}

/**
 * Key function for `Set`/`Map` lookups that agrees with `sameValue`: every
 * Date holding the same instant maps to the first such Date it was given.
 * Other values are their own key. Each call starts a fresh key space.
 */
export function valueKeyer(): (x: unknown) => unknown {
  const dates = new Map<number, Date>();
  return (x) => {
    if (!(x instanceof Date)) return x;
    const t = x.getTime();
    const first = dates.get(t);
    if (first !== undefined) return first;
    dates.set(t, x);
    return x;
  };
}
