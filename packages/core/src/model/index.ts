export {
  generateId,
  createTask,
  markCompleted,
  getPriorityValue,
  isDueOn,
  nextDueDate,
  buildRecurringTaskId,
  completeTask,
  statusLabel,
} from './task-helpers.js';
export type { CompletionTransition } from './task-helpers.js';
export { Pet } from './pet.js';
export type { PetInit } from './pet.js';
export { Owner } from './owner.js';
export type { OwnerPreferences, OwnerPreferencesInit, OwnerOptions } from './owner.js';
