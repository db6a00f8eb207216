import { z } from "zod";
import { IndexOutOfRangeError, OutOfRangeValueError } from "./errors";

/**
 * Bounded parameter schemas. Each one is checked with `bounded()`, which
 * reports a failure as `OutOfRangeValueError` instead of a ZodError.
 */
export const Percent = z.number().min(0, "Percentile must be between 0 and 100.").max(100, "Percentile must be between 0 and 100.");
export const BitShift = z.number().int().min(0, "Positions must be between 0 and 7.").max(7, "Positions must be between 0 and 7.");
export const GuidVersion = z.number().int().min(1, "GUID version must be between 1 and 5.").max(5, "GUID version must be between 1 and 5.");
export const NthOccurrence = z.number().int().min(1, "Value should be between 1 and 5.").max(5, "Value should be between 1 and 5.");
export const DayOfWeek = z.number().int().min(0, "Day of week must be between 0 (Sunday) and 6 (Saturday).").max(6, "Day of week must be between 0 (Sunday) and 6 (Saturday).");
export const PositiveInt = z.number().int().positive();
export const NonNegativeInt = z.number().int().nonnegative();

export function bounded<T>(schema: z.ZodType<T>, value: unknown, param: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new OutOfRangeValueError(issue?.message ?? `Invalid value for ${param}.`, param, { value });
  }
  return parsed.data;
}

/**
 * Index check over `[0, length)`, or `[0, length]` when `inclusiveEnd` is set
 * (insertion points).
 */
export function checkIndex(index: number, length: number, param = "index", inclusiveEnd = false): void {
  const upper = inclusiveEnd ? length : length - 1;
  if (!Number.isInteger(index) || index < 0 || index > upper) {
    throw new IndexOutOfRangeError(`Index ${index} is outside [0, ${upper}].`, param, { index, length });
  }
}
