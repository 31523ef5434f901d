/**
 * Calendar helpers for splitting a date range into month spans.
 *
 * All dates are UTC midnight; only the calendar day matters.
 */

import { InvalidRangeError } from './errors.js';
import type { DateRange, MonthSpan } from './types.js';

/**
 * A date parsed from the command line.
 *
 * `isMonth` is set for `YYYY-MM` input, in which case `value` is the first
 * day of that month.
 */
export interface DateSpec {
  value: Date;
  isMonth: boolean;
}

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Drop the time of day, keeping the UTC calendar date
 */
export function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function startOfMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

/**
 * Last calendar day of the month `date` falls into (leap years included)
 */
export function endOfMonth(date: Date): Date {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0));
}

function nextMonth(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1));
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function formatMonth(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/**
 * Split `[start, end]` into calendar-month spans.
 *
 * The first span starts at `start` and the last one stops at `end`; every
 * span in between covers a whole month. The returned iterable is lazy and can
 * be iterated more than once.
 *
 * @throws InvalidRangeError if `end` is before `start`
 */
export function monthBounds(start: Date, end: Date): Iterable<MonthSpan> {
  const first = startOfDay(start);
  const last = startOfDay(end);

  if (last < first) {
    throw new InvalidRangeError(start, end);
  }

  return {
    *[Symbol.iterator](): Iterator<MonthSpan> {
      let monthStart = startOfMonth(first);
      while (monthStart <= last) {
        const monthEnd = endOfMonth(monthStart);
        yield {
          first: monthStart < first ? first : monthStart,
          last: monthEnd < last ? monthEnd : last,
        };
        monthStart = nextMonth(monthStart);
      }
    },
  };
}

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM`.
 *
 * Returns null for anything else, including impossible dates like 2024-02-30.
 */
export function parseDateSpec(value: string): DateSpec | null {
  const text = value.trim();

  const day = DAY_PATTERN.exec(text);
  if (day) {
    const [year, month, dom] = [Number(day[1]), Number(day[2]), Number(day[3])];
    const date = utcDate(year, month, dom);
    // Date.UTC rolls 2024-02-30 over into March
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== dom) return null;
    return { value: date, isMonth: false };
  }

  const month = MONTH_PATTERN.exec(text);
  if (month) {
    const [year, mon] = [Number(month[1]), Number(month[2])];
    if (mon < 1 || mon > 12) return null;
    return { value: utcDate(year, mon, 1), isMonth: true };
  }

  return null;
}

/** Today's calendar date in the local time zone, as a UTC-midnight `Date`. */
export function localToday(now: Date = new Date()): Date {
  return utcDate(now.getFullYear(), now.getMonth() + 1, now.getDate());
}

/**
 * Turn command line `--start`/`--end` values into a concrete range.
 * `today` is a UTC-midnight calendar date and defaults to the local date.
 *
 * - A month start without an end covers that month, but never past `today`
 * - A day start needs an explicit end
 * - A month end means the last day of that month
 *
 * @throws InvalidRangeError if the resolved end is before the start
 */
export function resolveDateRange(start: DateSpec, end: DateSpec | undefined, today: Date = localToday()): DateRange {
  const first = start.value;
  let last: Date;

  if (!end) {
    if (!start.isMonth) {
      throw new Error('--end is required when --start includes a day');
    }
    last = endOfMonth(first);
    const todayDate = startOfDay(today);
    if (formatMonth(first) === formatMonth(todayDate) && todayDate < last) {
      last = todayDate;
    }
  } else {
    last = end.isMonth ? endOfMonth(end.value) : end.value;
  }

  if (last < first) {
    throw new InvalidRangeError(first, last);
  }

  return { first, last };
}
