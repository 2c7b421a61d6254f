/**
 * Composite task ordering shared by display sorting and schedule admission:
 * timed before untimed (earliest first), higher priority, shorter duration,
 * then title and id so the order never depends on input order.
 */

import type { Task } from '../types/task.js';
import { recurrenceDays } from '../types/recurrence.js';
import { getPriorityValue } from '../model/task-helpers.js';

export type SortKey = 'time' | 'priority' | 'duration' | 'title' | 'recurrence';

export const SORT_KEYS: readonly SortKey[] = ['time', 'priority', 'duration', 'title', 'recurrence'];

/** Priority score for the second level; a Schedule layers preference boosts on top of the rank */
export type PriorityScore = (task: Task) => number;

const rankScore: PriorityScore = getPriorityValue;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Timed tasks first, ascending start time */
function compareStartTime(a: Task, b: Task): number {
  if (a.startTimeMinutes === null && b.startTimeMinutes === null) return 0;
  if (a.startTimeMinutes === null) return 1;
  if (b.startTimeMinutes === null) return -1;
  return a.startTimeMinutes - b.startTimeMinutes;
}

/** Build the composite comparator for a given priority score */
export function compositeComparator(score: PriorityScore = rankScore): (a: Task, b: Task) => number {
  return (a, b) => {
    const time = compareStartTime(a, b);
    if (time !== 0) return time;
    // Priority: higher score first
    const priority = score(b) - score(a);
    if (priority !== 0) return priority;
    const duration = a.durationMinutes - b.durationMinutes;
    if (duration !== 0) return duration;
    const title = compareText(a.title, b.title);
    if (title !== 0) return title;
    return compareText(a.id, b.id);
  };
}

export const compareTasks = compositeComparator();

/** Recurring tasks by how often they come back (daily first), one-time tasks last */
function compareRecurrence(a: Task, b: Task): number {
  const da = recurrenceDays(a.recurrence) ?? Number.POSITIVE_INFINITY;
  const db = recurrenceDays(b.recurrence) ?? Number.POSITIVE_INFINITY;
  if (da === db) return 0;
  return da < db ? -1 : 1;
}

function primaryComparator(sortBy: SortKey): (a: Task, b: Task) => number {
  switch (sortBy) {
    case 'time': return () => 0;
    case 'priority': return (a, b) => b.priority - a.priority;
    case 'duration': return (a, b) => a.durationMinutes - b.durationMinutes;
    case 'title': return (a, b) => compareText(a.title.toLowerCase(), b.title.toLowerCase());
    case 'recurrence': return compareRecurrence;
  }
}

/** Sort a copy of the tasks by the requested key, ties broken by the composite ordering */
export function sortTasks(tasks: readonly Task[], sortBy: SortKey = 'time'): Task[] {
  const primary = primaryComparator(sortBy);
  return [...tasks].sort((a, b) => primary(a, b) || compareTasks(a, b));
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some(key => key === value);
}
