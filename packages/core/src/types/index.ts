export { Priority, PriorityName, isPriority, parsePriority } from './priority.js';
export { Recurrence, recurrenceDays, isRecurring, parseRecurrence, recurrenceLabel } from './recurrence.js';
export type { RecurrenceKind } from './recurrence.js';
export type { TaskId, IsoDate, Task, TaskInit, CompletionEvent } from './task.js';
export type { OpResult, DataResult, BatchResult } from './results.js';
export { isSuccess, isError, successCount, anyFailed } from './results.js';
