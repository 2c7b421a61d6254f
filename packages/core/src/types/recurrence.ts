/** How a completed task becomes due again */
export type Recurrence =
  | { readonly kind: 'none' }
  | { readonly kind: 'daily' }
  | { readonly kind: 'weekly' }
  | { readonly kind: 'interval'; readonly days: number };

export type RecurrenceKind = Recurrence['kind'];

export const Recurrence = {
  None: { kind: 'none' },
  Daily: { kind: 'daily' },
  Weekly: { kind: 'weekly' },
  every(days: number): Recurrence {
    return { kind: 'interval', days };
  },
} as const satisfies Record<string, Recurrence | ((days: number) => Recurrence)>;

/** Number of days between completion and the next due date, or null for one-time tasks */
export function recurrenceDays(recurrence: Recurrence): number | null {
  switch (recurrence.kind) {
    case 'none': return null;
    case 'daily': return 1;
    case 'weekly': return 7;
    case 'interval': return recurrence.days;
  }
}

export function isRecurring(recurrence: Recurrence): boolean {
  return recurrence.kind !== 'none';
}

const EVERY_RE = /^every:(\d+)$/;
const DAYS_RE = /^(\d+)d$/;

/**
 * Parse a recurrence label: none/once, daily, weekly, interval (with intervalDays),
 * every:<n> or <n>d. Returns null for anything else, including a zero interval.
 */
export function parseRecurrence(label: string, intervalDays?: number | null): Recurrence | null {
  const normalized = label.trim().toLowerCase();
  switch (normalized) {
    case 'none': case 'once': return Recurrence.None;
    case 'daily': return Recurrence.Daily;
    case 'weekly': return Recurrence.Weekly;
    case 'interval':
      return intervalDays != null && Number.isInteger(intervalDays) && intervalDays > 0
        ? Recurrence.every(intervalDays)
        : null;
  }

  const m = EVERY_RE.exec(normalized) ?? DAYS_RE.exec(normalized);
  if (!m) return null;
  const days = parseInt(m[1]!, 10);
  return days > 0 ? Recurrence.every(days) : null;
}

/** Label used for display and for the household file */
export function recurrenceLabel(recurrence: Recurrence): string {
  return recurrence.kind === 'interval' ? `every:${recurrence.days}` : recurrence.kind;
}
