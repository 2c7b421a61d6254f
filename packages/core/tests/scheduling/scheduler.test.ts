import { describe, it, expect, beforeEach } from 'vitest';
import { Scheduler } from '../../src/scheduling/scheduler.js';
import { Owner } from '../../src/model/owner.js';
import { Pet } from '../../src/model/pet.js';
import { Priority } from '../../src/types/priority.js';
import { Recurrence } from '../../src/types/recurrence.js';
import { successCount, anyFailed } from '../../src/types/results.js';
import { markCompleted } from '../../src/model/task-helpers.js';
import { makeTask } from '../fixtures.js';

let owner: Owner;
let rex: Pet;
let milo: Pet;
let scheduler: Scheduler;

beforeEach(() => {
  owner = new Owner('Sam', { availableTimeMinutes: 60 });
  rex = new Pet({ name: 'Rex', species: 'dog' });
  milo = new Pet({ name: 'Milo', species: 'cat' });
  owner.addPet(rex);
  owner.addPet(milo);
  scheduler = new Scheduler(owner);
});

describe('Scheduler queries', () => {
  beforeEach(() => {
    rex.addTask(makeTask({ id: 'walk', title: 'Walk', priority: Priority.High, startTimeMinutes: 480, recurrence: Recurrence.Daily }));
    rex.addTask(markCompleted(makeTask({ id: 'bath', title: 'Bath', taskType: 'grooming' }), '2026-10-18'));
    milo.addTask(makeTask({ id: 'brush', title: 'Brush', taskType: 'grooming' }));
    milo.addTask(makeTask({ id: 'meds', title: 'Meds', priority: Priority.Critical, taskType: 'medication' }));
  });

  it('collects tasks across pets', () => {
    expect(scheduler.getAllTasks().map(t => t.id)).toEqual(['walk', 'bath', 'brush', 'meds']);
    expect(scheduler.getPendingTasks().map(t => t.id)).toEqual(['walk', 'brush', 'meds']);
  });

  it('groups tasks by pet', () => {
    const byPet = scheduler.getTasksByPet(false);
    expect([...byPet.keys()]).toEqual(['Rex', 'Milo']);
    expect(byPet.get('Rex')?.map(t => t.id)).toEqual(['walk']);
  });

  it('lists due tasks in composite order', () => {
    expect(scheduler.getDueTasks('2026-10-19').map(t => t.id)).toEqual(['walk', 'meds', 'brush']);
  });

  it('organizes by priority by default', () => {
    expect(scheduler.organizeTasks({ includeCompleted: false }).map(t => t.id)).toEqual(['meds', 'walk', 'brush']);
    expect(scheduler.organizeTasks({ sortBy: 'time' }).map(t => t.id)).toEqual(['walk', 'meds', 'bath', 'brush']);
  });

  it('filters by pet, status and type together', () => {
    expect(scheduler.filterTasks({ petName: 'Rex' }).map(t => t.id)).toEqual(['walk', 'bath']);
    expect(scheduler.filterTasks({ status: 'completed' }).map(t => t.id)).toEqual(['bath']);
    expect(scheduler.filterTasks({ taskType: 'grooming', status: 'pending' }).map(t => t.id)).toEqual(['brush']);
    expect(scheduler.filterTasks({ petName: 'Nobody' })).toEqual([]);
    expect(scheduler.filterTasks().length).toBe(4);
  });

  it('finds a task and its pet', () => {
    expect(scheduler.findTask('brush')?.pet.name).toBe('Milo');
    expect(scheduler.findTask('nope')).toBeNull();
  });
});

describe('detectTimeConflicts', () => {
  it('reports tasks sharing a start time across pets', () => {
    rex.addTask(makeTask({ id: 'walk', title: 'Walk', startTimeMinutes: 480 }));
    milo.addTask(makeTask({ id: 'feed', title: 'Feed', startTimeMinutes: 480 }));
    milo.addTask(makeTask({ id: 'play', title: 'Play', startTimeMinutes: 540 }));

    const reports = scheduler.detectTimeConflicts();
    expect(reports).toHaveLength(1);
    expect(reports[0]?.timeLabel).toBe('08:00');
    expect(reports[0]?.message).toBe('Warning: 08:00 conflict between Rex - Walk, Milo - Feed.');
  });

  it('reports same-pet clashes and sorts by time', () => {
    rex.addTask(makeTask({ id: 'a', startTimeMinutes: 600 }));
    rex.addTask(makeTask({ id: 'b', startTimeMinutes: 600 }));
    milo.addTask(makeTask({ id: 'c', startTimeMinutes: 420 }));
    milo.addTask(makeTask({ id: 'd', startTimeMinutes: 420 }));

    expect(scheduler.detectTimeConflicts().map(r => r.timeLabel)).toEqual(['07:00', '10:00']);
  });

  it('ignores untimed and completed tasks unless asked', () => {
    rex.addTask(makeTask({ id: 'a' }));
    milo.addTask(makeTask({ id: 'b' }));
    rex.addTask(markCompleted(makeTask({ id: 'c', startTimeMinutes: 480 }), '2026-10-18'));
    milo.addTask(makeTask({ id: 'd', startTimeMinutes: 480 }));

    expect(scheduler.detectTimeConflicts()).toEqual([]);
    expect(scheduler.detectTimeConflicts({ includeCompleted: true })).toHaveLength(1);
  });

  it('limits to tasks due on a date', () => {
    rex.addTask(makeTask({ id: 'a', startTimeMinutes: 480, recurrence: Recurrence.Weekly, lastCompletedDate: '2026-10-18' }));
    milo.addTask(makeTask({ id: 'b', startTimeMinutes: 480 }));

    expect(scheduler.detectTimeConflicts()).toHaveLength(1);
    expect(scheduler.detectTimeConflicts({ date: '2026-10-19' })).toEqual([]);
  });

  it('does not change any task', () => {
    rex.addTask(makeTask({ id: 'a', startTimeMinutes: 480 }));
    milo.addTask(makeTask({ id: 'b', startTimeMinutes: 480 }));
    const before = scheduler.getAllTasks();
    scheduler.detectTimeConflicts();
    expect(scheduler.getAllTasks()).toEqual(before);
  });
});

describe('markTaskCompleted', () => {
  it('completes a daily task and adds the next occurrence to the same pet', () => {
    rex.addTask(makeTask({ id: 'walk', title: 'Walk', recurrence: Recurrence.Daily }));

    const result = scheduler.markTaskCompleted('walk', '2026-10-19');
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(result.message).toBe('Completed (walk) Walk; next occurrence (walk-20261020) due 2026-10-20');
    expect(result.data.petName).toBe('Rex');
    expect(result.data.event.nextDueDate).toBe('2026-10-20');

    expect(rex.getTasks().map(t => [t.id, t.completed])).toEqual([['walk', true], ['walk-20261020', false]]);
    expect(scheduler.getDueTasks('2026-10-19')).toEqual([]);
    expect(scheduler.getDueTasks('2026-10-20').map(t => t.id)).toEqual(['walk-20261020']);
  });

  it('completes a one-time task without spawning', () => {
    milo.addTask(makeTask({ id: 'vet', title: 'Vet visit' }));
    const result = scheduler.markTaskCompleted('vet', '2026-10-19');
    expect(result).toMatchObject({ type: 'success', message: 'Completed (vet) Vet visit' });
    expect(milo.taskCount).toBe(1);
  });

  it('is a no-change for an already completed task', () => {
    rex.addTask(makeTask({ id: 'walk', title: 'Walk', recurrence: Recurrence.Daily }));
    scheduler.markTaskCompleted('walk', '2026-10-19');

    const again = scheduler.markTaskCompleted('walk', '2026-10-19');
    expect(again).toEqual({ type: 'no-change', message: 'Task (walk) Walk is already completed' });
    expect(rex.taskCount).toBe(2);
  });

  it('reports unknown ids', () => {
    expect(scheduler.markTaskCompleted('nope', '2026-10-19')).toEqual({ type: 'not-found', id: 'nope' });
  });

  it('avoids ids used by any pet', () => {
    rex.addTask(makeTask({ id: 'walk', recurrence: Recurrence.Daily }));
    milo.addTask(makeTask({ id: 'walk-20261020' }));

    const result = scheduler.markTaskCompleted('walk', '2026-10-19');
    expect(result.type === 'success' && result.data.next?.id).toBe('walk-20261020-1');
  });

  it('completes a batch', () => {
    rex.addTask(makeTask({ id: 'a' }));
    milo.addTask(makeTask({ id: 'b' }));

    const batch = scheduler.markTasksCompleted(['a', 'b', 'nope'], '2026-10-19');
    expect(successCount(batch)).toBe(2);
    expect(anyFailed(batch)).toBe(true);
    expect(batch.results[2]).toEqual({ type: 'not-found', id: 'nope' });
  });
});
