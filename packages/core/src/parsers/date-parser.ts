/**
 * Parses human-friendly date strings into yyyy-MM-dd format.
 * Supports: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15), and ISO format.
 *
 * Also holds the calendar arithmetic on yyyy-MM-dd strings that the
 * due-date rules run on. That part never reads the clock.
 */

import type { IsoDate } from '../types/task.js';

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86400000;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd (local calendar day) */
export function formatDate(d: Date): IsoDate {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/** Add months to a date (returns new Date) */
function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

// ---------------------------------------------------------------------------
// yyyy-MM-dd arithmetic (UTC based, so DST never shifts a day)
// ---------------------------------------------------------------------------

function toUtcMs(date: IsoDate): number | null {
  const m = ISO_DATE_RE.exec(date);
  if (!m) return null;
  const year = parseInt(m[1]!, 10);
  const month = parseInt(m[2]!, 10) - 1;
  const day = parseInt(m[3]!, 10);
  const ms = Date.UTC(year, month, day);
  const check = new Date(ms);
  // Rejects rollovers such as 2026-02-30
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

function fromUtcMs(ms: number): IsoDate {
  return new Date(ms).toISOString().slice(0, 10);
}

/** True for a real calendar date written as yyyy-MM-dd */
export function isIsoDate(value: unknown): value is IsoDate {
  return typeof value === 'string' && toUtcMs(value) !== null;
}

function requireUtcMs(date: IsoDate): number {
  const ms = toUtcMs(date);
  if (ms === null) throw new RangeError(`Not a yyyy-MM-dd date: ${date}`);
  return ms;
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((requireUtcMs(to) - requireUtcMs(from)) / MS_PER_DAY);
}

/** Shift a yyyy-MM-dd date by n days */
export function shiftDate(date: IsoDate, n: number): IsoDate {
  return fromUtcMs(requireUtcMs(date) + n * MS_PER_DAY);
}

/** yyyy-MM-dd → yyyyMMdd, used in derived ids */
export function compactDate(date: IsoDate): string {
  return date.replaceAll('-', '');
}

// ---------------------------------------------------------------------------
// Human-friendly input
// ---------------------------------------------------------------------------

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = parseInt(m[1]!, 10);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const month = MONTH_MAP[m[1]!]!;
  const day = parseInt(m[2]!, 10);

  const candidate = new Date(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // Invalid date (e.g. feb30)
  }

  // If the date is in the past, use next year
  if (formatDate(candidate) < formatDate(today)) {
    candidate.setFullYear(candidate.getFullYear() + 1);
  }
  return formatDate(candidate);
}

function tryParseStandard(input: string): string | null {
  return isIsoDate(input) ? input : null;
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): IsoDate | null {
  if (!input?.trim()) return null;

  const today = now ? new Date(now.getTime()) : new Date();
  today.setHours(0, 0, 0, 0);

  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? tryParseStandard(input.trim());
  }
}
