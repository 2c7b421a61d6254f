/**
 * Dependency graph helpers for schedule admission.
 */

import type { Task, TaskId } from '../types/task.js';

export type DependencyGraph = ReadonlyMap<TaskId, ReadonlySet<TaskId>>;

export function buildDependencyGraph(tasks: readonly Task[]): DependencyGraph {
  return new Map(tasks.map((t): [TaskId, ReadonlySet<TaskId>] => [t.id, t.dependsOn]));
}

/** Ids of every task reachable through dependency edges from `taskId` */
export function getAllDependencyIds(graph: DependencyGraph, taskId: TaskId): Set<TaskId> {
  const seen = new Set<TaskId>();
  const stack = [...(graph.get(taskId) ?? [])];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    for (const dep of graph.get(id) ?? []) stack.push(dep);
  }
  return seen;
}

/** True when following the task's dependencies leads back to the task itself */
export function hasCircularDependency(graph: DependencyGraph, taskId: TaskId): boolean {
  return getAllDependencyIds(graph, taskId).has(taskId);
}

/** Dependencies of `task` that are not in `satisfied` */
export function unmetDependencies(task: Task, satisfied: ReadonlySet<TaskId>): TaskId[] {
  return [...task.dependsOn].filter(id => !satisfied.has(id));
}
