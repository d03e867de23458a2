import { describe, it, expect } from 'vitest';
import {
  daysBetween,
  enumerateDates,
  isCalendarDate,
  resolveDateRange,
  shiftDate,
  todayIn,
} from './date-range.js';
import { InvalidDateRangeError } from '../errors.js';

describe('date-range', () => {
  describe('shiftDate', () => {
    it('moves across month and year boundaries', () => {
      expect(shiftDate('2026-03-01', -1)).toBe('2026-02-28');
      expect(shiftDate('2025-12-31', 1)).toBe('2026-01-01');
    });

    it('handles leap days', () => {
      expect(shiftDate('2028-02-28', 1)).toBe('2028-02-29');
    });

    it('is unaffected by daylight-saving transitions', () => {
      expect(shiftDate('2026-03-08', 1)).toBe('2026-03-09');
      expect(shiftDate('2026-11-01', -1)).toBe('2026-10-31');
    });

    it('rejects malformed dates', () => {
      expect(() => shiftDate('2026-2-7', 1)).toThrow(InvalidDateRangeError);
      expect(() => shiftDate('2026-02-30', 1)).toThrow(InvalidDateRangeError);
    });
  });

  describe('daysBetween', () => {
    it('counts whole days', () => {
      expect(daysBetween('2026-02-01', '2026-02-05')).toBe(4);
      expect(daysBetween('2026-02-05', '2026-02-01')).toBe(-4);
      expect(daysBetween('2026-02-05', '2026-02-05')).toBe(0);
    });
  });

  describe('enumerateDates', () => {
    it('lists every date ascending, inclusive', () => {
      expect(enumerateDates({ start: '2026-01-30', end: '2026-02-02' })).toEqual([
        '2026-01-30',
        '2026-01-31',
        '2026-02-01',
        '2026-02-02',
      ]);
    });

    it('returns a single date for a one-day range', () => {
      expect(enumerateDates({ start: '2026-02-07', end: '2026-02-07' })).toEqual(['2026-02-07']);
    });

    it('rejects an inverted range', () => {
      expect(() => enumerateDates({ start: '2026-02-07', end: '2026-02-06' })).toThrow(
        InvalidDateRangeError
      );
    });
  });

  describe('isCalendarDate', () => {
    it('accepts real dates only', () => {
      expect(isCalendarDate('2026-02-07')).toBe(true);
      expect(isCalendarDate('2026-13-01')).toBe(false);
      expect(isCalendarDate('07/02/2026')).toBe(false);
    });
  });

  describe('todayIn', () => {
    it('uses the calendar date of the given zone', () => {
      const now = new Date('2026-02-07T20:00:00Z');
      expect(todayIn('Asia/Tokyo', now)).toBe('2026-02-08');
      expect(todayIn('America/New_York', now)).toBe('2026-02-07');
      expect(todayIn('UTC', now)).toBe('2026-02-07');
    });
  });

  describe('resolveDateRange', () => {
    it('uses an explicit from/to pair', () => {
      expect(resolveDateRange({ from: '2026-02-02', to: '2026-02-06' }, '2026-02-07', 5)).toEqual({
        start: '2026-02-02',
        end: '2026-02-06',
      });
    });

    it('requires from and to together', () => {
      expect(() => resolveDateRange({ from: '2026-02-02' }, '2026-02-07', 5)).toThrow(
        'Both --from and --to are required for an explicit range'
      );
    });

    it('rejects from after to', () => {
      expect(() =>
        resolveDateRange({ from: '2026-02-06', to: '2026-02-02' }, '2026-02-07', 5)
      ).toThrow(InvalidDateRangeError);
    });

    it('counts back from today when given days', () => {
      expect(resolveDateRange({ days: 3 }, '2026-02-07', 5)).toEqual({
        start: '2026-02-05',
        end: '2026-02-07',
      });
    });

    it('falls back to the default day count', () => {
      expect(resolveDateRange({}, '2026-02-07', 5)).toEqual({
        start: '2026-02-03',
        end: '2026-02-07',
      });
    });

    it('rejects a non-positive day count', () => {
      expect(() => resolveDateRange({ days: 0 }, '2026-02-07', 5)).toThrow(
        'Day count must be a positive integer, got 0'
      );
    });
  });
});
