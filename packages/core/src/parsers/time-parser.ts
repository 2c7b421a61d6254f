/**
 * Clock times for fixed-start tasks, stored as minutes from midnight.
 */

const TIME_RE = /^(\d{1,2}):(\d{2})$/;

export const MINUTES_PER_DAY = 24 * 60;

export function isMinuteOfDay(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < MINUTES_PER_DAY;
}

/** Parse "8:05" / "08:05" into minutes from midnight, or null */
export function parseTime(input: string | null | undefined): number | null {
  if (!input?.trim()) return null;
  const m = TIME_RE.exec(input.trim());
  if (!m) return null;

  const hours = parseInt(m[1]!, 10);
  const minutes = parseInt(m[2]!, 10);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

/** Format minutes from midnight as HH:mm */
export function formatTime(minutes: number): string {
  const h = String(Math.floor(minutes / 60)).padStart(2, '0');
  const m = String(minutes % 60).padStart(2, '0');
  return `${h}:${m}`;
}
