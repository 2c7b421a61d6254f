import type { TaskId, Task, TaskInit, IsoDate, CompletionEvent } from '../types/task.js';
import { isPriority } from '../types/priority.js';
import { Recurrence, recurrenceDays } from '../types/recurrence.js';
import { isIsoDate, daysBetween, shiftDate, compactDate } from '../parsers/date-parser.js';
import { isMinuteOfDay } from '../parsers/time-parser.js';
import { ValidationError } from '../errors.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 4;

/** Generate a random 4-character task ID */
export function generateId(): TaskId {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
  }
  return id;
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError(field, 'must not be empty');
  return trimmed;
}

function validateRecurrence(recurrence: Recurrence): Recurrence {
  switch (recurrence.kind) {
    case 'none':
    case 'daily':
    case 'weekly':
      return recurrence;
    case 'interval':
      if (!Number.isInteger(recurrence.days) || recurrence.days <= 0) {
        throw new ValidationError('recurrence', `interval must be a positive whole number of days, got ${recurrence.days}`);
      }
      return recurrence;
    default:
      throw new ValidationError('recurrence', `unknown rule ${JSON.stringify(recurrence)}`);
  }
}

function toSet(values: Iterable<string> | undefined): ReadonlySet<string> {
  const set = new Set<string>();
  for (const v of values ?? []) {
    const trimmed = v.trim();
    if (trimmed) set.add(trimmed);
  }
  return set;
}

/**
 * Create a validated Task.
 * Throws ValidationError instead of coercing bad input.
 */
export function createTask(init: TaskInit): Task {
  const id = requireText('id', init.id);
  const title = requireText('title', init.title);
  const taskType = requireText('task type', init.taskType);

  if (!Number.isInteger(init.durationMinutes) || init.durationMinutes <= 0) {
    throw new ValidationError('duration', `must be a positive whole number of minutes, got ${init.durationMinutes}`);
  }
  if (!isPriority(init.priority)) {
    throw new ValidationError('priority', `unrecognized priority ${String(init.priority)}`);
  }

  const startTimeMinutes = init.startTimeMinutes ?? null;
  if (startTimeMinutes !== null && !isMinuteOfDay(startTimeMinutes)) {
    throw new ValidationError('start time', `must be between 0 and 1439 minutes, got ${startTimeMinutes}`);
  }

  const lastCompletedDate = init.lastCompletedDate ?? null;
  if (lastCompletedDate !== null && !isIsoDate(lastCompletedDate)) {
    throw new ValidationError('last completed date', `expected yyyy-MM-dd, got ${lastCompletedDate}`);
  }

  const dependsOn = toSet(init.dependsOn);
  if (dependsOn.has(id)) {
    throw new ValidationError('dependencies', `task ${id} cannot depend on itself`);
  }

  return {
    id,
    title,
    description: init.description?.trim() || title,
    durationMinutes: init.durationMinutes,
    priority: init.priority,
    taskType,
    completed: init.completed ?? false,
    startTimeMinutes,
    recurrence: validateRecurrence(init.recurrence ?? Recurrence.None),
    lastCompletedDate,
    applicableSpecies: toSet(init.applicableSpecies),
    preferenceTags: toSet(init.preferenceTags),
    dependsOn,
    requiresSpecialNeeds: init.requiresSpecialNeeds ?? false,
  };
}

/** Return a copy of the task marked completed on the given date */
export function markCompleted(task: Task, on: IsoDate): Task {
  return { ...task, completed: true, lastCompletedDate: on };
}

/** Numeric rank of the task's priority; higher is more urgent */
export function getPriorityValue(task: Task): number {
  return task.priority;
}

/**
 * Whether the task is schedulable on the target date.
 * Never-completed tasks are always due; one-time tasks stop being due once done;
 * recurring tasks are due once their interval has elapsed since the last completion.
 */
export function isDueOn(task: Task, date: IsoDate): boolean {
  if (task.lastCompletedDate === null) return !task.completed || task.recurrence.kind !== 'none';

  const interval = recurrenceDays(task.recurrence);
  if (interval === null) return !task.completed;
  return daysBetween(task.lastCompletedDate, date) >= interval;
}

/** Date the next occurrence becomes due, or null for one-time tasks */
export function nextDueDate(task: Task, completedOn: IsoDate): IsoDate | null {
  const interval = recurrenceDays(task.recurrence);
  return interval === null ? null : shiftDate(completedOn, interval);
}

/**
 * Id for the occurrence due on `dueDate`: `<id>-<yyyyMMdd>`, with a numeric
 * suffix when that id is already taken.
 */
export function buildRecurringTaskId(baseId: TaskId, dueDate: IsoDate, existingIds: ReadonlySet<TaskId>): TaskId {
  const base = `${baseId}-${compactDate(dueDate)}`;
  let candidate = base;
  let counter = 1;
  while (existingIds.has(candidate)) {
    candidate = `${base}-${counter}`;
    counter++;
  }
  return candidate;
}

export interface CompletionTransition {
  readonly task: Task;
  readonly next: Task | null;
  readonly event: CompletionEvent;
}

/**
 * Complete a task and, for recurring tasks, derive the next occurrence.
 * Pure: the caller decides where the new values go.
 */
export function completeTask(task: Task, on: IsoDate, existingIds: ReadonlySet<TaskId> = new Set()): CompletionTransition {
  const completed = markCompleted(task, on);
  const dueDate = nextDueDate(task, on);

  if (dueDate === null) {
    return {
      task: completed,
      next: null,
      event: { taskId: task.id, completedOn: on, nextTaskId: null, nextDueDate: null },
    };
  }

  const next: Task = {
    ...task,
    id: buildRecurringTaskId(task.id, dueDate, existingIds),
    completed: false,
    lastCompletedDate: on,
  };

  return {
    task: completed,
    next,
    event: { taskId: task.id, completedOn: on, nextTaskId: next.id, nextDueDate: dueDate },
  };
}

/** Status label for messages */
export function statusLabel(task: Task): string {
  return task.completed ? 'done' : 'pending';
}
