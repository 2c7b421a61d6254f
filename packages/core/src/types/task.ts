import type { Priority } from './priority.js';
import type { Recurrence } from './recurrence.js';

export type TaskId = string;
/** Calendar date as yyyy-MM-dd */
export type IsoDate = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly durationMinutes: number;
  readonly priority: Priority;
  readonly taskType: string;
  readonly completed: boolean;
  readonly startTimeMinutes: number | null; // minutes from midnight, null = untimed
  readonly recurrence: Recurrence;
  readonly lastCompletedDate: IsoDate | null;
  readonly applicableSpecies: ReadonlySet<string>;
  readonly preferenceTags: ReadonlySet<string>;
  readonly dependsOn: ReadonlySet<TaskId>;
  readonly requiresSpecialNeeds: boolean;
}

/** Fields accepted by createTask; everything past the first five is optional */
export interface TaskInit {
  id: TaskId;
  title: string;
  durationMinutes: number;
  priority: Priority;
  taskType: string;
  description?: string;
  completed?: boolean;
  startTimeMinutes?: number | null;
  recurrence?: Recurrence;
  lastCompletedDate?: IsoDate | null;
  applicableSpecies?: Iterable<string>;
  preferenceTags?: Iterable<string>;
  dependsOn?: Iterable<TaskId>;
  requiresSpecialNeeds?: boolean;
}

/** Record of a completion transition */
export interface CompletionEvent {
  readonly taskId: TaskId;
  readonly completedOn: IsoDate;
  readonly nextTaskId: TaskId | null;
  readonly nextDueDate: IsoDate | null;
}
