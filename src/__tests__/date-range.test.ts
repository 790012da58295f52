/**
 * Tests for monthly range splitting and date formats.
 */

import { describe, it, expect } from 'vitest';
import {
  createDateRange,
  splitMonthly,
  parseDateString,
  endOfDay,
  formatYearMonth,
  formatSqlDate,
  formatSqlDateTime,
  formatDisplayDate,
  InvalidRangeError,
  InvalidDateError,
} from '../index.js';

describe('splitMonthly', () => {
  it('should split a range into calendar months', () => {
    const periods = Array.from(
      splitMonthly({ start: new Date(2025, 0, 1, 0, 0, 0), end: new Date(2025, 2, 15, 23, 59, 59) })
    );

    expect(periods).toEqual([
      { index: 1, start: new Date(2025, 0, 1), end: new Date(2025, 0, 31, 23, 59, 59, 999) },
      { index: 2, start: new Date(2025, 1, 1), end: new Date(2025, 1, 28, 23, 59, 59, 999) },
      { index: 3, start: new Date(2025, 2, 1), end: new Date(2025, 2, 15, 23, 59, 59) },
    ]);
  });

  it('should cross the year boundary', () => {
    const periods = Array.from(splitMonthly({ start: new Date(2024, 11, 15), end: new Date(2025, 0, 10) }));

    expect(periods).toEqual([
      { index: 1, start: new Date(2024, 11, 15), end: new Date(2024, 11, 31, 23, 59, 59, 999) },
      { index: 2, start: new Date(2025, 0, 1), end: new Date(2025, 0, 10) },
    ]);
  });

  it('should end February on the 29th in leap years', () => {
    const periods = Array.from(splitMonthly({ start: new Date(2024, 1, 10), end: new Date(2024, 2, 5) }));

    expect(periods[0]?.end).toEqual(new Date(2024, 1, 29, 23, 59, 59, 999));
  });

  it('should produce contiguous periods covering the whole range', () => {
    const range = { start: new Date(2024, 1, 10, 8, 30), end: new Date(2024, 4, 20, 23, 59, 59, 999) };
    const periods = Array.from(splitMonthly(range));

    expect(periods).toHaveLength(4);
    expect(periods[0]?.start).toEqual(range.start);
    expect(periods[periods.length - 1]?.end).toEqual(range.end);
    for (let i = 1; i < periods.length; i++) {
      const previous = periods[i - 1];
      const current = periods[i];
      expect(current && previous ? current.start.getTime() - previous.end.getTime() : NaN).toBe(1);
    }
  });

  it('should return a single period for a range inside one month', () => {
    const range = { start: new Date(2025, 5, 3), end: new Date(2025, 5, 3, 23, 59, 59, 999) };

    expect(Array.from(splitMonthly(range))).toEqual([{ index: 1, ...range }]);
  });

  it('should be restartable', () => {
    const periods = splitMonthly({ start: new Date(2025, 0, 1), end: new Date(2025, 3, 30) });

    expect(Array.from(periods)).toHaveLength(4);
    expect(Array.from(periods)).toHaveLength(4);
  });

  it('should reject a range whose start is after its end before iterating', () => {
    expect(() => splitMonthly({ start: new Date(2025, 1, 1), end: new Date(2025, 0, 1) })).toThrow(
      InvalidRangeError
    );
  });
});

describe('createDateRange', () => {
  it('should accept equal bounds', () => {
    const day = new Date(2025, 0, 1);
    expect(createDateRange(day, day)).toEqual({ start: day, end: day });
  });

  it('should reject start after end', () => {
    expect(() => createDateRange(new Date(2025, 0, 2), new Date(2025, 0, 1))).toThrow(InvalidRangeError);
  });
});

describe('parseDateString', () => {
  it('should parse YYYYMMDD as local midnight', () => {
    expect(parseDateString('20250131')).toEqual(new Date(2025, 0, 31));
  });

  it('should reject impossible dates', () => {
    expect(() => parseDateString('20250231')).toThrow(InvalidDateError);
    expect(() => parseDateString('20251301')).toThrow(InvalidDateError);
  });

  it('should reject other formats', () => {
    expect(() => parseDateString('2025-01-01')).toThrow(
      'Invalid date: 2025-01-01. Use the format YYYYMMDD (e.g. 20250101)'
    );
  });
});

describe('formatting', () => {
  const date = new Date(2025, 0, 5, 7, 8, 9, 999);

  it('should format year and month', () => {
    expect(formatYearMonth(date)).toBe('202501');
  });

  it('should format SQL dates', () => {
    expect(formatSqlDate(date)).toBe('20250105');
    expect(formatSqlDateTime(date)).toBe('20250105 07:08:09');
  });

  it('should format display dates', () => {
    expect(formatDisplayDate(date)).toBe('05/01/2025');
  });

  it('should move to the last instant of the day', () => {
    expect(endOfDay(new Date(2025, 0, 31, 10))).toEqual(new Date(2025, 0, 31, 23, 59, 59, 999));
  });
});
