/**
 * Calendar-month partitioning of date ranges, plus the date formats used on
 * the wire, in file names and in log lines.
 *
 * All calendar arithmetic runs in local time, the clock the CLI parses dates in.
 * @module batch/date-range
 */

import type { DateRange, MonthlyPeriod } from '../types/index.js';
import { InvalidDateError, InvalidRangeError } from '../errors/index.js';

// ============================================================================
// Ranges
// ============================================================================

/**
 * Creates a range, enforcing `start <= end`.
 *
 * @throws {InvalidRangeError} If start is after end
 */
export function createDateRange(start: Date, end: Date): DateRange {
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(start, end);
  }
  return Object.freeze({ start: new Date(start.getTime()), end: new Date(end.getTime()) });
}

function lastInstantOfMonth(year: number, month: number): Date {
  return new Date(year, month + 1, 0, 23, 59, 59, 999);
}

/**
 * Splits an inclusive range into calendar-month periods.
 *
 * The first period starts at `range.start`, the last ends at `range.end`, and
 * consecutive periods are 1 ms apart. The result is lazy and can be iterated
 * any number of times.
 *
 * @throws {InvalidRangeError} If start is after end
 */
export function splitMonthly(range: DateRange): Iterable<MonthlyPeriod> {
  const start = new Date(range.start.getTime());
  const end = new Date(range.end.getTime());
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(start, end);
  }

  return {
    *[Symbol.iterator](): Iterator<MonthlyPeriod> {
      let year = start.getFullYear();
      let month = start.getMonth();
      let index = 1;

      while (new Date(year, month, 1).getTime() <= end.getTime()) {
        const monthStart = new Date(year, month, 1);
        const monthEnd = lastInstantOfMonth(year, month);

        yield Object.freeze({
          index,
          start: new Date(Math.max(monthStart.getTime(), start.getTime())),
          end: new Date(Math.min(monthEnd.getTime(), end.getTime())),
        });

        index += 1;
        month += 1;
        if (month > 11) {
          month = 0;
          year += 1;
        }
      }
    },
  };
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parses a `YYYYMMDD` string as local midnight.
 *
 * @throws {InvalidDateError} On a malformed or impossible calendar date
 */
export function parseDateString(value: string): Date {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new InvalidDateError(value);
  }

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);

  // Date rolls 20250231 over into March
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    throw new InvalidDateError(value);
  }
  return date;
}

/**
 * Last instant of the given day.
 */
export function endOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59, 999);
}

// ============================================================================
// Formatting
// ============================================================================

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYYMM`, used in artifact names.
 */
export function formatYearMonth(date: Date): string {
  return `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}`;
}

/**
 * `YYYYMMDD`, the date-only literal SQL Server parses regardless of language settings.
 */
export function formatSqlDate(date: Date): string {
  return `${formatYearMonth(date)}${pad(date.getDate())}`;
}

/**
 * `YYYYMMDD HH:MM:SS`, the datetime form sent for temporal arguments.
 */
export function formatSqlDateTime(date: Date): string {
  return `${formatSqlDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * `DD/MM/YYYY`, for log lines.
 */
export function formatDisplayDate(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${pad(date.getFullYear(), 4)}`;
}
