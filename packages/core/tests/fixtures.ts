import type { Task, TaskInit } from '../src/types/task.js';
import { Priority } from '../src/types/priority.js';
import { createTask } from '../src/model/task-helpers.js';

/** Build a task with sensible defaults: a 10 minute, low priority, untimed walk */
export function makeTask(overrides: Partial<TaskInit> & { id: string }): Task {
  return createTask({
    title: overrides.id,
    durationMinutes: 10,
    priority: Priority.Low,
    taskType: 'walk',
    ...overrides,
  });
}
