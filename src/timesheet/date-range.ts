/**
 * Calendar date arithmetic
 *
 * Dates are `YYYY-MM-DD` strings. Arithmetic runs on UTC midnight so a day is
 * always 24 hours, whatever the local zone does with daylight saving.
 */

import { InvalidDateRangeError } from '../errors.js';
import type { CalendarDate, DateRange } from '../types/timesheet.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function toUtcMs(date: CalendarDate): number {
  if (!isCalendarDate(date)) {
    throw new InvalidDateRangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  return Date.parse(`${date}T00:00:00Z`);
}

/** `date` moved by `days` calendar days (negative goes back). */
export function shiftDate(date: CalendarDate, days: number): CalendarDate {
  return new Date(toUtcMs(date) + days * DAY_MS).toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

/** Every date in the range, ascending, both ends included. */
export function enumerateDates(range: DateRange): CalendarDate[] {
  const span = daysBetween(range.start, range.end);
  if (span < 0) {
    throw new InvalidDateRangeError(`Range start ${range.start} is after end ${range.end}`);
  }

  const dates: CalendarDate[] = [];
  for (let offset = 0; offset <= span; offset++) {
    dates.push(shiftDate(range.start, offset));
  }
  return dates;
}

/** The calendar date it currently is in `timeZone` (an IANA name). */
export function todayIn(timeZone: string, now: Date = new Date()): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

// ─── Range Resolution ────────────────────────────────────────

export interface DateRangeRequest {
  from?: string;
  to?: string;
  days?: number;
}

/**
 * Turn CLI or tool arguments into a validated range.
 *
 * An explicit `from`/`to` pair wins. Otherwise the range is the last `days`
 * days (default `defaultDays`) ending on `today`.
 */
export function resolveDateRange(
  request: DateRangeRequest,
  today: CalendarDate,
  defaultDays: number
): DateRange {
  const { from, to, days } = request;

  if (from !== undefined || to !== undefined) {
    if (from === undefined || to === undefined) {
      throw new InvalidDateRangeError('Both --from and --to are required for an explicit range');
    }
    const span = daysBetween(from, to);
    if (span < 0) {
      throw new InvalidDateRangeError(`Range start ${from} is after end ${to}`);
    }
    return { start: from, end: to };
  }

  const count = days ?? defaultDays;
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidDateRangeError(`Day count must be a positive integer, got ${count}`);
  }

  return { start: shiftDate(today, -(count - 1)), end: today };
}
