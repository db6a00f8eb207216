/**
 * Date-array queries. Calendar fields (weekday, day, month, year) are read
 * in UTC so results do not depend on the host time zone.
 */

import { requireNonEmpty } from "../core/errors";
import { bounded, DayOfWeek, NthOccurrence } from "../core/validate";
import type { DayOfWeekT, Quarter, Season } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

const isWeekend = (d: Date): boolean => d.getUTCDay() === 0 || d.getUTCDay() === 6;

/** `YYYY-MM-DD` of the UTC calendar day. */
export const dayKey = (d: Date): string => d.toISOString().slice(0, 10);

export function earliest(dates: readonly Date[]): Date {
  requireNonEmpty(dates);
  return dates.reduce((a, b) => (b.getTime() < a.getTime() ? b : a));
}

export function latest(dates: readonly Date[]): Date {
  requireNonEmpty(dates);
  return dates.reduce((a, b) => (b.getTime() > a.getTime() ? b : a));
}

/** Milliseconds between the earliest and latest date. */
export const span = (dates: readonly Date[]): number => latest(dates).getTime() - earliest(dates).getTime();

export function filterByRange(dates: readonly Date[], start: Date, end: Date): Date[] {
  const lo = start.getTime();
  const hi = end.getTime();
  return dates.filter((d) => d.getTime() >= lo && d.getTime() <= hi);
}

export const allInFuture = (dates: readonly Date[], now: Date = new Date()): boolean =>
  dates.every((d) => d.getTime() > now.getTime());

export const allInPast = (dates: readonly Date[], now: Date = new Date()): boolean =>
  dates.every((d) => d.getTime() < now.getTime());

/** Nearest date to `reference`; ties go to the first in input order. */
export function closestTo(dates: readonly Date[], reference: Date): Date {
  requireNonEmpty(dates);
  const ref = reference.getTime();
  return dates.reduce((best, d) => (Math.abs(d.getTime() - ref) < Math.abs(best.getTime() - ref) ? d : best));
}

/** Every date sharing the minimum distance to `reference`. */
export function equidistant(dates: readonly Date[], reference: Date): Date[] {
  if (dates.length === 0) return [];
  const ref = reference.getTime();
  const distances = dates.map((d) => Math.abs(d.getTime() - ref));
  const min = distances.reduce((m, x) => (x < m ? x : m));
  return dates.filter((_, i) => distances[i] === min);
}

function groupBy<K>(dates: readonly Date[], key: (d: Date) => K): Map<K, Date[]> {
  const m = new Map<K, Date[]>();
  for (const d of dates) {
    const k = key(d);
    const bucket = m.get(k) ?? [];
    bucket.push(d);
    m.set(k, bucket);
  }
  return m;
}

export const groupByYear = (dates: readonly Date[]) => groupBy(dates, (d) => d.getUTCFullYear());

/** Keys are months 1-12. */
export const groupByMonth = (dates: readonly Date[]) => groupBy(dates, (d) => d.getUTCMonth() + 1);

/** Keys are days of the month 1-31. */
export const groupByDay = (dates: readonly Date[]) => groupBy(dates, (d) => d.getUTCDate());

/** Keys are 0 (Sunday) to 6 (Saturday). */
export const groupByDayOfWeek = (dates: readonly Date[]) => groupBy(dates, (d) => d.getUTCDay());

export const quarterOf = (d: Date): Quarter => {
  const m = d.getUTCMonth();
  return m < 3 ? 1 : m < 6 ? 2 : m < 9 ? 3 : 4;
};

export const groupByQuarter = (dates: readonly Date[]) => groupBy(dates, quarterOf);

/** 2024 -> 2020. */
export const decadeOf = (d: Date): number => Math.floor(d.getUTCFullYear() / 10) * 10;

export const groupByDecade = (dates: readonly Date[]) => groupBy(dates, decadeOf);

/** Meteorological seasons, northern hemisphere. */
export function seasonOf(d: Date): Season {
  const m = d.getUTCMonth();
  if (m === 11 || m <= 1) return "winter";
  if (m <= 4) return "spring";
  if (m <= 7) return "summer";
  return "autumn";
}

export const groupBySeason = (dates: readonly Date[]) => groupBy(dates, seasonOf);

export const weekdays = (dates: readonly Date[]): Date[] => dates.filter((d) => !isWeekend(d));

export const weekends = (dates: readonly Date[]): Date[] => dates.filter(isWeekend);

/** Distinct instants present in both `dates` and `holidays`, in `dates` order. */
export function holidaysIn(dates: readonly Date[], holidays: readonly Date[]): Date[] {
  const wanted = new Set(holidays.map((h) => h.getTime()));
  const seen = new Set<number>();
  return dates.filter((d) => {
    const t = d.getTime();
    if (!wanted.has(t) || seen.has(t)) return false;
    seen.add(t);
    return true;
  });
}

/**
 * Steps from the earliest instant in 24-hour increments, visiting
 * `floor(span / 1 day) + 1` instants, and counts those falling on a UTC
 * Monday-Friday whose UTC calendar date is not in `holidays`. A partial
 * trailing day is not visited: Monday 23:00 to Tuesday 01:00 counts 1.
 */
export function businessDays(dates: readonly Date[], holidays: readonly Date[] = []): number {
  const start = earliest(dates).getTime();
  const totalDays = Math.floor((latest(dates).getTime() - start) / DAY_MS);
  const off = new Set(holidays.map(dayKey));
  let count = 0;
  for (let i = 0; i <= totalDays; i++) {
    const day = new Date(start + i * DAY_MS);
    if (!isWeekend(day) && !off.has(dayKey(day))) count++;
  }
  return count;
}

/**
 * Dates that fall on the `n`th `dayOfWeek` of their month, where the nth
 * occurrence is the 7-day bucket `floor((day - 1) / 7) === n - 1`.
 */
export function nthWeekdayOfMonth(dates: readonly Date[], dayOfWeek: DayOfWeekT, n: number): Date[] {
  bounded(DayOfWeek, dayOfWeek, "dayOfWeek");
  bounded(NthOccurrence, n, "n");
  return dates.filter((d) => d.getUTCDay() === dayOfWeek && Math.floor((d.getUTCDate() - 1) / 7) === n - 1);
}

/** Dates on the last `dayOfWeek` of their month: a week later is next month. */
export function lastWeekdayOfMonth(dates: readonly Date[], dayOfWeek: DayOfWeekT): Date[] {
  bounded(DayOfWeek, dayOfWeek, "dayOfWeek");
  return dates.filter((d) => d.getUTCDay() === dayOfWeek && new Date(d.getTime() + 7 * DAY_MS).getUTCMonth() !== d.getUTCMonth());
}
