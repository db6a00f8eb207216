import Decimal from "decimal.js";

// banker's rounding for roundAll and exact sums
const Dec = Decimal.clone({ rounding: Decimal.ROUND_HALF_EVEN, precision: 40 });

export function D(x: number | string | Decimal): Decimal {
  return x instanceof Dec ? x : new Dec(x);
}

export function roundHalfEven(x: number, places: number): number {
  return D(x).toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN).toNumber();
}

export function exactSum(xs: Iterable<number | string | Decimal>): Decimal {
  let acc = D(0);
  for (const x of xs) acc = acc.plus(x);
  return acc;
}

export { Decimal };
