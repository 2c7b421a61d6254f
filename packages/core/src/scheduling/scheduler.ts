/**
 * Cross-pet task operations over one owner's household: sorting, filtering,
 * conflict detection and completion with recurrence.
 */

import type { Task, TaskId, IsoDate, CompletionEvent } from '../types/task.js';
import type { OpResult, DataResult, BatchResult } from '../types/results.js';
import type { Owner } from '../model/owner.js';
import type { Pet } from '../model/pet.js';
import { completeTask, isDueOn } from '../model/task-helpers.js';
import { formatTime } from '../parsers/time-parser.js';
import { sortTasks, compareTasks } from './ordering.js';
import type { SortKey } from './ordering.js';

export type StatusFilter = 'pending' | 'completed' | 'any';

export interface TaskFilter {
  petName?: string;
  status?: StatusFilter;
  taskType?: string;
}

export interface ConflictEntry {
  readonly petName: string;
  readonly task: Task;
}

export interface ConflictReport {
  readonly startTimeMinutes: number;
  readonly timeLabel: string;
  readonly entries: readonly ConflictEntry[];
  readonly message: string;
}

export interface CompletionOutcome {
  readonly petName: string;
  readonly task: Task;
  readonly next: Task | null;
  readonly event: CompletionEvent;
}

export interface TaskLocation {
  readonly pet: Pet;
  readonly task: Task;
}

export class Scheduler {
  constructor(private readonly owner: Owner) {}

  getAllTasks(includeCompleted = true): Task[] {
    return this.owner.getAllTasks(includeCompleted);
  }

  getPendingTasks(): Task[] {
    return this.owner.getAllTasks(false);
  }

  /** Tasks grouped by pet name, in pet order */
  getTasksByPet(includeCompleted = true): Map<string, Task[]> {
    return new Map(this.owner.pets.map((pet): [string, Task[]] => [pet.name, pet.getTasks(includeCompleted)]));
  }

  /** Pending tasks due on the date, in composite order */
  getDueTasks(date: IsoDate): Task[] {
    return this.getPendingTasks().filter(t => isDueOn(t, date)).sort(compareTasks);
  }

  organizeTasks(opts: { includeCompleted?: boolean; sortBy?: SortKey } = {}): Task[] {
    return sortTasks(this.getAllTasks(opts.includeCompleted ?? true), opts.sortBy ?? 'priority');
  }

  /** Tasks matching every given criterion; omitted criteria match everything */
  filterTasks(filter: TaskFilter = {}): Task[] {
    const pets = filter.petName !== undefined
      ? this.owner.pets.filter(p => p.name === filter.petName)
      : this.owner.pets;

    return pets
      .flatMap(pet => pet.getTasks(true))
      .filter(task => {
        if (filter.status === 'pending' && task.completed) return false;
        if (filter.status === 'completed' && !task.completed) return false;
        if (filter.taskType !== undefined && task.taskType !== filter.taskType) return false;
        return true;
      });
  }

  /**
   * Report tasks across all pets that share a start time. Advisory only:
   * untimed tasks never conflict, and nothing is changed.
   */
  detectTimeConflicts(opts: { includeCompleted?: boolean; date?: IsoDate } = {}): ConflictReport[] {
    const byTime = new Map<number, ConflictEntry[]>();

    for (const pet of this.owner.pets) {
      for (const task of pet.getTasks(opts.includeCompleted ?? false)) {
        if (task.startTimeMinutes === null) continue;
        if (opts.date !== undefined && !isDueOn(task, opts.date)) continue;
        const group = byTime.get(task.startTimeMinutes) ?? [];
        group.push({ petName: pet.name, task });
        byTime.set(task.startTimeMinutes, group);
      }
    }

    return [...byTime.entries()]
      .filter(([, entries]) => entries.length >= 2)
      .sort(([a], [b]) => a - b)
      .map(([startTimeMinutes, entries]) => {
        const timeLabel = formatTime(startTimeMinutes);
        const names = entries.map(e => `${e.petName} - ${e.task.title}`).join(', ');
        return {
          startTimeMinutes,
          timeLabel,
          entries,
          message: `Warning: ${timeLabel} conflict between ${names}.`,
        };
      });
  }

  findTask(taskId: TaskId): TaskLocation | null {
    for (const pet of this.owner.pets) {
      const task = pet.getTask(taskId);
      if (task) return { pet, task };
    }
    return null;
  }

  /**
   * Complete a task on the given date. Recurring tasks get their next
   * occurrence added to the same pet. Completing an already completed task
   * is a no-change, so it never spawns a second occurrence.
   */
  markTaskCompleted(taskId: TaskId, on: IsoDate): DataResult<CompletionOutcome> {
    const found = this.findTask(taskId);
    if (!found) return { type: 'not-found', id: taskId };
    if (found.task.completed) {
      return { type: 'no-change', message: `Task (${taskId}) ${found.task.title} is already completed` };
    }

    const existingIds = new Set(this.getAllTasks(true).map(t => t.id));
    const { task, next, event } = completeTask(found.task, on, existingIds);
    found.pet.replaceTask(task);
    if (next) found.pet.addTask(next);

    const message = next
      ? `Completed (${task.id}) ${task.title}; next occurrence (${next.id}) due ${event.nextDueDate}`
      : `Completed (${task.id}) ${task.title}`;

    return {
      type: 'success',
      data: { petName: found.pet.name, task, next, event },
      message,
    };
  }

  markTasksCompleted(taskIds: readonly TaskId[], on: IsoDate): BatchResult {
    const results = taskIds.map((id): OpResult => {
      const result = this.markTaskCompleted(id, on);
      return result.type === 'success' ? { type: 'success', message: result.message } : result;
    });
    return { results };
  }
}
