// Result runtime with helpers, for callers that prefer values to exceptions

import { isArrayKitError, type ErrorCode } from "./errors";

export type Ok<T> = { t: "ok"; v: T };
export type Err = { t: "err"; code: ErrorCode; msg?: string; data?: unknown };
export type Result<T> = Ok<T> | Err;

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v });
export const err = (code: Err["code"], msg?: string, data?: unknown): Err => ({ t: "err", code, msg, data });

export const isOk = <T>(r: Result<T>): r is Ok<T> => r.t === "ok";
export const isErr = <T>(r: Result<T>): r is Err => r.t === "err";

export const map = <A, B>(r: Result<A>, f: (a: A) => B): Result<B> =>
  isOk(r) ? ok(f(r.v)) : r;

export const andThen = <A, B>(r: Result<A>, f: (a: A) => Result<B>): Result<B> =>
  isOk(r) ? f(r.v) : r;

export const unwrap = <T>(r: Result<T>, dflt: T): T => (isOk(r) ? r.v : dflt);

export const match = <T, R>(r: Result<T>, arms: { ok: (v: T) => R; err: (e: Err) => R }): R =>
  isOk(r) ? arms.ok(r.v) : arms.err(r);

/**
 * Runs `fn` and captures a thrown library error as an `Err` carrying its code.
 * Anything that is not an `ArrayKitError` is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (e) {
    if (isArrayKitError(e)) {
      return err(e.code, e.message, e.param === undefined ? e.data : { param: e.param, ...toRecord(e.data) });
    }
    throw e;
  }
}

function toRecord(data: unknown): Record<string, unknown> {
  if (data !== null && typeof data === "object" && !Array.isArray(data)) {
    return { ...data };
  }
  return data === undefined ? {} : { value: data };
}
