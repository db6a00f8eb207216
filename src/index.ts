/**
 * arraykit - stateless helpers over arrays
 *
 * Generic structural operations are exported flat and under `generic`.
 * Element-specific groups (numbers, text, booleans, dates, bytes, GUIDs,
 * grids) are exported as namespaces since their names overlap.
 */

export * from "./types";
export * from "./generic";
export * as generic from "./generic";

export * as stats from "./numeric/stats";
export * as integers from "./numeric/integers";
export * as strings from "./text/strings";
export * as chars from "./text/chars";
export * as booleans from "./logical/booleans";
export * as dates from "./temporal/dates";
export * as bytes from "./binary/bytes";
export * as patterns from "./binary/patterns";
export * as guids from "./identifiers/guids";
export * as grid from "./matrix/grid";

export {
  ArrayKitError,
  InvalidArgumentError,
  IndexOutOfRangeError,
  OutOfRangeValueError,
  LengthMismatchError,
  isArrayKitError,
} from "./core/errors";
export type { ErrorCode } from "./core/errors";
export { ok, err, isOk, isErr, map, andThen, unwrap, match, attempt } from "./core/result";
export type { Ok, Err, Result } from "./core/result";
export { defaultCompare, reverseCompare, compareBy, sameValue } from "./core/compare";
export { defaultRandom, seededRandom } from "./core/random";
export { Decimal } from "./core/decimal";
export { configure, getConfig, resetConfig, loadSettings } from "./core/config";
export type { SettingsT, LogLevelT } from "./core/config";
