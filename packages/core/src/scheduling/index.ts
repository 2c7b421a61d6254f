export { compareTasks, compositeComparator, sortTasks, isSortKey, SORT_KEYS } from './ordering.js';
export type { SortKey, PriorityScore } from './ordering.js';
export {
  buildDependencyGraph,
  getAllDependencyIds,
  hasCircularDependency,
  unmetDependencies,
} from './dependencies.js';
export type { DependencyGraph } from './dependencies.js';
export { Scheduler } from './scheduler.js';
export type {
  StatusFilter,
  TaskFilter,
  ConflictEntry,
  ConflictReport,
  CompletionOutcome,
  TaskLocation,
} from './scheduler.js';
export { Schedule } from './schedule.js';
export type {
  AdmissionReason,
  SkipReason,
  ExclusionReason,
  ExplanationEntry,
  UnscheduledTask,
  ScheduleConflict,
} from './schedule.js';
