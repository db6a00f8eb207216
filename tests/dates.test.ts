import { describe, it, expect } from 'vitest';
import * as dates from '../src/temporal/dates';
import { DayOfWeek } from '../src/types';
import { InvalidArgumentError, OutOfRangeValueError } from '../src/core/errors';

const DAY = 24 * 60 * 60 * 1000;
const utc = (y: number, m: number, d: number, h = 0) => new Date(Date.UTC(y, m - 1, d, h));

// 2023-01-01 is a Sunday
const firstWeek = [1, 2, 3, 4, 5, 6, 7].map((d) => utc(2023, 1, d));

describe('extremes and span', () => {
  const xs = [utc(2023, 5, 1), utc(2021, 1, 1), utc(2024, 2, 29)];

  it('earliest / latest', () => {
    expect(dates.earliest(xs)).toEqual(utc(2021, 1, 1));
    expect(dates.latest(xs)).toEqual(utc(2024, 2, 29));
    expect(() => dates.earliest([])).toThrow(InvalidArgumentError);
  });

  it('span in milliseconds', () => {
    expect(dates.span(firstWeek)).toBe(6 * DAY);
  });

  it('filters an inclusive range', () => {
    expect(dates.filterByRange(firstWeek, utc(2023, 1, 3), utc(2023, 1, 5))).toEqual([
      utc(2023, 1, 3),
      utc(2023, 1, 4),
      utc(2023, 1, 5),
    ]);
  });

  it('compares against an explicit now', () => {
    const now = utc(2023, 1, 4);
    expect(dates.allInFuture([utc(2023, 1, 5)], now)).toBe(true);
    expect(dates.allInPast(firstWeek, now)).toBe(false);
    expect(dates.allInPast([utc(2023, 1, 1)], now)).toBe(true);
  });
});

describe('closest', () => {
  const xs = [utc(2023, 1, 3), utc(2023, 1, 7), utc(2023, 1, 10)];

  it('closestTo breaks ties by input order', () => {
    expect(dates.closestTo(xs, utc(2023, 1, 5))).toEqual(utc(2023, 1, 3));
    expect(dates.closestTo(xs, utc(2023, 1, 9))).toEqual(utc(2023, 1, 10));
  });

  it('equidistant returns every nearest date', () => {
    expect(dates.equidistant(xs, utc(2023, 1, 5))).toEqual([utc(2023, 1, 3), utc(2023, 1, 7)]);
    expect(dates.equidistant([], utc(2023, 1, 5))).toEqual([]);
  });

  it('equidistant handles very long inputs', () => {
    const many = Array.from({ length: 300_000 }, (_, i) => new Date(i * 10));
    expect(dates.equidistant(many, new Date(5))).toEqual([new Date(0), new Date(10)]);
  });
});

describe('grouping', () => {
  const xs = [utc(2023, 1, 5), utc(2023, 2, 1), utc(2024, 1, 9), utc(2019, 12, 24)];

  it('by year, month and day', () => {
    expect([...dates.groupByYear(xs).keys()]).toEqual([2023, 2024, 2019]);
    const byMonth = dates.groupByMonth(xs);
    expect([...byMonth.keys()]).toEqual([1, 2, 12]);
    expect(byMonth.get(1)).toEqual([utc(2023, 1, 5), utc(2024, 1, 9)]);
    expect([...dates.groupByDay(xs).keys()]).toEqual([5, 1, 9, 24]);
  });

  it('by day of week', () => {
    const byDow = dates.groupByDayOfWeek(firstWeek);
    expect(byDow.get(DayOfWeek.Sunday)).toEqual([utc(2023, 1, 1)]);
    expect(byDow.size).toBe(7);
  });

  it('by quarter, decade and season', () => {
    expect(dates.quarterOf(utc(2023, 2, 1))).toBe(1);
    expect(dates.quarterOf(utc(2023, 8, 1))).toBe(3);
    expect(dates.decadeOf(utc(2024, 1, 1))).toBe(2020);
    expect([...dates.groupByDecade(xs).keys()]).toEqual([2020, 2010]);
    expect(dates.seasonOf(utc(2023, 12, 1))).toBe('winter');
    expect(dates.seasonOf(utc(2023, 3, 1))).toBe('spring');
    expect(dates.seasonOf(utc(2023, 6, 1))).toBe('summer');
    expect(dates.seasonOf(utc(2023, 11, 30))).toBe('autumn');
    expect(dates.groupBySeason(xs).get('winter')).toEqual([utc(2023, 1, 5), utc(2023, 2, 1), utc(2024, 1, 9), utc(2019, 12, 24)]);
    expect([...dates.groupByQuarter(xs).keys()]).toEqual([1, 4]);
  });
});

describe('working days', () => {
  it('splits weekdays from weekends', () => {
    expect(dates.weekends(firstWeek)).toEqual([utc(2023, 1, 1), utc(2023, 1, 7)]);
    expect(dates.weekdays(firstWeek)).toHaveLength(5);
  });

  it('counts business days across the span', () => {
    expect(dates.businessDays(firstWeek)).toBe(5);
    expect(dates.businessDays([utc(2023, 1, 7), utc(2023, 1, 1)])).toBe(5);
  });

  it('steps whole days from the earliest instant', () => {
    // Monday 23:00 to Tuesday 01:00 spans no whole day
    expect(dates.businessDays([utc(2023, 1, 2, 23), utc(2023, 1, 3, 1)])).toBe(1);
    // Friday noon to Monday 11:00 visits Friday, Saturday and Sunday only
    expect(dates.businessDays([utc(2023, 1, 6, 12), utc(2023, 1, 9, 11)])).toBe(1);
  });

  it('skips holidays by calendar day', () => {
    expect(dates.businessDays(firstWeek, [utc(2023, 1, 2, 15)])).toBe(4);
    expect(dates.businessDays(firstWeek, [utc(2023, 1, 1)])).toBe(5);
  });

  it('lists holidays present once each', () => {
    const xs = [utc(2023, 1, 1), utc(2023, 1, 2), utc(2023, 1, 1)];
    expect(dates.holidaysIn(xs, [utc(2023, 1, 1), utc(2023, 3, 1)])).toEqual([utc(2023, 1, 1)]);
  });
});

describe('weekday occurrences', () => {
  const mondays = [utc(2023, 1, 2), utc(2023, 1, 9), utc(2023, 1, 16), utc(2023, 1, 23), utc(2023, 1, 30)];

  it('nth weekday of the month', () => {
    expect(dates.nthWeekdayOfMonth(mondays, DayOfWeek.Monday, 2)).toEqual([utc(2023, 1, 9)]);
    expect(dates.nthWeekdayOfMonth(mondays, DayOfWeek.Monday, 5)).toEqual([utc(2023, 1, 30)]);
    expect(dates.nthWeekdayOfMonth(mondays, DayOfWeek.Tuesday, 1)).toEqual([]);
  });

  it('bounds n to 1..5', () => {
    expect(() => dates.nthWeekdayOfMonth(mondays, DayOfWeek.Monday, 6)).toThrow(OutOfRangeValueError);
    expect(() => dates.nthWeekdayOfMonth(mondays, DayOfWeek.Monday, 0)).toThrow('Value should be between 1 and 5.');
  });

  it('last weekday of the month', () => {
    expect(dates.lastWeekdayOfMonth(mondays, DayOfWeek.Monday)).toEqual([utc(2023, 1, 30)]);
    expect(dates.lastWeekdayOfMonth([utc(2023, 2, 27)], DayOfWeek.Monday)).toEqual([utc(2023, 2, 27)]);
  });
});
