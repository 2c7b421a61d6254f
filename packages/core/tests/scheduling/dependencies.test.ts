import { describe, it, expect } from 'vitest';
import {
  buildDependencyGraph, getAllDependencyIds, hasCircularDependency, unmetDependencies,
} from '../../src/scheduling/dependencies.js';
import { makeTask } from '../fixtures.js';

describe('dependency graph', () => {
  const chain = [
    makeTask({ id: 'a' }),
    makeTask({ id: 'b', dependsOn: ['a'] }),
    makeTask({ id: 'c', dependsOn: ['b'] }),
  ];

  it('collects transitive dependencies', () => {
    const graph = buildDependencyGraph(chain);
    expect([...getAllDependencyIds(graph, 'c')].sort()).toEqual(['a', 'b']);
    expect(getAllDependencyIds(graph, 'a').size).toBe(0);
  });

  it('finds no cycle in a chain', () => {
    const graph = buildDependencyGraph(chain);
    expect(chain.some(t => hasCircularDependency(graph, t.id))).toBe(false);
  });

  it('detects a two-task cycle', () => {
    const graph = buildDependencyGraph([
      makeTask({ id: 'x', dependsOn: ['y'] }),
      makeTask({ id: 'y', dependsOn: ['x'] }),
    ]);
    expect(hasCircularDependency(graph, 'x')).toBe(true);
    expect(hasCircularDependency(graph, 'y')).toBe(true);
  });

  it('does not flag a task that merely points into a cycle', () => {
    const graph = buildDependencyGraph([
      makeTask({ id: 'x', dependsOn: ['y'] }),
      makeTask({ id: 'y', dependsOn: ['x'] }),
      makeTask({ id: 'z', dependsOn: ['x'] }),
    ]);
    expect(hasCircularDependency(graph, 'z')).toBe(false);
  });

  it('tolerates dependencies outside the graph', () => {
    const graph = buildDependencyGraph([makeTask({ id: 'a', dependsOn: ['ghost'] })]);
    expect([...getAllDependencyIds(graph, 'a')]).toEqual(['ghost']);
  });
});

describe('unmetDependencies', () => {
  it('lists dependencies not yet satisfied', () => {
    const task = makeTask({ id: 'c', dependsOn: ['a', 'b'] });
    expect(unmetDependencies(task, new Set(['a']))).toEqual(['b']);
    expect(unmetDependencies(task, new Set(['a', 'b']))).toEqual([]);
  });
});
