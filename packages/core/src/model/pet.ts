/**
 * A pet and the care tasks it owns, keyed by task id in insertion order.
 */

import type { Task, TaskId } from '../types/task.js';
import type { OpResult } from '../types/results.js';
import { ValidationError } from '../errors.js';

export interface PetInit {
  name: string;
  species: string;
  age?: number;
  specialNeeds?: Iterable<string>;
}

export class Pet {
  readonly name: string;
  readonly species: string;
  readonly age: number;
  readonly specialNeeds: readonly string[];
  private tasks = new Map<TaskId, Task>();

  constructor(init: PetInit) {
    const name = init.name.trim();
    const species = init.species.trim();
    if (!name) throw new ValidationError('pet name', 'must not be empty');
    if (!species) throw new ValidationError('species', 'must not be empty');

    const age = init.age ?? 0;
    if (!Number.isInteger(age) || age < 0) {
      throw new ValidationError('age', `must be a non-negative whole number, got ${age}`);
    }

    this.name = name;
    this.species = species;
    this.age = age;
    this.specialNeeds = [...(init.specialNeeds ?? [])].map(n => n.trim()).filter(n => n.length > 0);
  }

  get taskCount(): number { return this.tasks.size; }

  hasSpecialNeeds(): boolean {
    return this.specialNeeds.length > 0;
  }

  /** Add a task; a duplicate id is rejected and leaves the pet unchanged */
  addTask(task: Task): OpResult {
    if (this.tasks.has(task.id)) {
      return { type: 'error', message: `Task ${task.id} already exists for ${this.name}` };
    }
    this.tasks.set(task.id, task);
    return { type: 'success', message: `Added task (${task.id}) ${task.title} to ${this.name}` };
  }

  /** Remove a task by id. Returns true if removed. */
  removeTask(taskId: TaskId): boolean {
    return this.tasks.delete(taskId);
  }

  getTask(taskId: TaskId): Task | null {
    return this.tasks.get(taskId) ?? null;
  }

  hasTask(taskId: TaskId): boolean {
    return this.tasks.has(taskId);
  }

  /** Swap in a new value for an existing task, keeping its position */
  replaceTask(task: Task): boolean {
    if (!this.tasks.has(task.id)) return false;
    this.tasks.set(task.id, task);
    return true;
  }

  getTasks(includeCompleted = true): Task[] {
    const all = [...this.tasks.values()];
    return includeCompleted ? all : all.filter(t => !t.completed);
  }

  getPendingTasks(): Task[] {
    return this.getTasks(false);
  }
}
