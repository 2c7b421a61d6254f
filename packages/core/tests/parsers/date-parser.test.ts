import { describe, it, expect } from 'vitest';
import {
  parseDate, isIsoDate, daysBetween, shiftDate, compactDate,
} from '../../src/parsers/date-parser.js';

/** Create a fixed "today" date for deterministic tests */
function today(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('parseDate', () => {
  const fixed = today(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('  ')).toBeNull();
  });

  it('parses named dates', () => {
    expect(parseDate('today', fixed)).toBe('2026-02-08');
    expect(parseDate('tomorrow', fixed)).toBe('2026-02-09');
    expect(parseDate('yesterday', fixed)).toBe('2026-02-07');
  });

  it('is case-insensitive', () => {
    expect(parseDate('TODAY', fixed)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', fixed)).toBe('2026-02-09');
  });

  it('parses relative offsets', () => {
    expect(parseDate('+3d', fixed)).toBe('2026-02-11');
    expect(parseDate('+2w', fixed)).toBe('2026-02-22');
    expect(parseDate('+1m', fixed)).toBe('2026-03-08');
  });

  it('parses day-of-week names (next occurrence)', () => {
    expect(parseDate('mon', fixed)).toBe('2026-02-09');
    expect(parseDate('friday', fixed)).toBe('2026-02-13');
  });

  it('returns next week when day-of-week matches today', () => {
    expect(parseDate('sunday', fixed)).toBe('2026-02-15');
  });

  it('parses monthDD format and rolls past dates to next year', () => {
    expect(parseDate('mar15', fixed)).toBe('2026-03-15');
    expect(parseDate('jan1', fixed)).toBe('2027-01-01');
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  it('parses yyyy-MM-dd and rejects impossible dates', () => {
    expect(parseDate('2026-03-01', fixed)).toBe('2026-03-01');
    expect(parseDate('2026-13-01', fixed)).toBeNull();
    expect(parseDate('2026-02-30', fixed)).toBeNull();
    expect(parseDate('not-a-date', fixed)).toBeNull();
  });

  it('does not modify the reference date', () => {
    const now = new Date(2026, 1, 8, 15, 30);
    parseDate('today', now);
    expect(now.getHours()).toBe(15);
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates only', () => {
    expect(isIsoDate('2028-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-2-1')).toBe(false);
    expect(isIsoDate(20260201)).toBe(false);
  });
});

describe('daysBetween', () => {
  it('counts whole days, negative when going back', () => {
    expect(daysBetween('2026-10-19', '2026-10-20')).toBe(1);
    expect(daysBetween('2026-10-19', '2026-10-19')).toBe(0);
    expect(daysBetween('2026-10-20', '2026-10-13')).toBe(-7);
  });

  it('crosses month and year boundaries', () => {
    expect(daysBetween('2026-12-30', '2027-01-02')).toBe(3);
    expect(daysBetween('2026-02-27', '2026-03-01')).toBe(2);
  });

  it('throws on malformed input', () => {
    expect(() => daysBetween('2026-10-19', 'tomorrow')).toThrow(RangeError);
  });
});

describe('shiftDate / compactDate', () => {
  it('shifts by days', () => {
    expect(shiftDate('2026-10-19', 1)).toBe('2026-10-20');
    expect(shiftDate('2026-12-29', 7)).toBe('2027-01-05');
    expect(shiftDate('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('drops the dashes', () => {
    expect(compactDate('2026-10-20')).toBe('20261020');
  });
});
