/**
 * Error taxonomy shared by every group.
 *
 * Codes are stable strings so callers (and `attempt`) can branch on them
 * without instanceof checks across bundles.
 */

export type ErrorCode =
  | "invalid_argument"    // collection empty where at least one element is needed, or a bad pairing of params
  | "index_out_of_range"  // positional argument outside the valid bound
  | "out_of_range_value"  // bounded parameter (percentile, shift, version...) outside its bound
  | "length_mismatch";    // paired-array operation on arrays of different lengths

export class ArrayKitError extends Error {
  readonly code: ErrorCode;
  readonly param?: string;
  readonly data?: unknown;

  constructor(code: ErrorCode, message: string, param?: string, data?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.param = param;
    this.data = data;
  }
}

export class InvalidArgumentError extends ArrayKitError {
  constructor(message: string, param?: string, data?: unknown) {
    super("invalid_argument", message, param, data);
  }
}

export class IndexOutOfRangeError extends ArrayKitError {
  constructor(message: string, param?: string, data?: unknown) {
    super("index_out_of_range", message, param, data);
  }
}

export class OutOfRangeValueError extends ArrayKitError {
  constructor(message: string, param?: string, data?: unknown) {
    super("out_of_range_value", message, param, data);
  }
}

export class LengthMismatchError extends ArrayKitError {
  constructor(left: number, right: number, param = "other") {
    super("length_mismatch", "Arrays must have the same length.", param, { left, right });
  }
}

export const isArrayKitError = (e: unknown): e is ArrayKitError => e instanceof ArrayKitError;

/**
 * Throws `InvalidArgumentError` when the collection is empty.
 */
export function requireNonEmpty(xs: ArrayLike<unknown>, param = "arr"): void {
  if (xs.length === 0) {
    throw new InvalidArgumentError("Array is empty.", param);
  }
}

export function requireSameLength(a: ArrayLike<unknown>, b: ArrayLike<unknown>, param = "other"): void {
  if (a.length !== b.length) {
    throw new LengthMismatchError(a.length, b.length, param);
  }
}
