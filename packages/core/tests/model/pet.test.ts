import { describe, it, expect } from 'vitest';
import { Pet } from '../../src/model/pet.js';
import { markCompleted } from '../../src/model/task-helpers.js';
import { ValidationError } from '../../src/errors.js';
import { makeTask } from '../fixtures.js';

describe('Pet', () => {
  it('validates construction input', () => {
    expect(() => new Pet({ name: ' ', species: 'dog' })).toThrow(ValidationError);
    expect(() => new Pet({ name: 'Rex', species: '' })).toThrow('Invalid species: must not be empty');
    expect(() => new Pet({ name: 'Rex', species: 'dog', age: -1 })).toThrow('Invalid age');
  });

  it('tracks special needs', () => {
    expect(new Pet({ name: 'Rex', species: 'dog' }).hasSpecialNeeds()).toBe(false);
    expect(new Pet({ name: 'Milo', species: 'cat', specialNeeds: ['diabetic'] }).hasSpecialNeeds()).toBe(true);
    expect(new Pet({ name: 'Milo', species: 'cat', specialNeeds: [' '] }).hasSpecialNeeds()).toBe(false);
  });

  it('starts with no tasks', () => {
    const pet = new Pet({ name: 'Rex', species: 'dog' });
    expect(pet.getTasks()).toEqual([]);
    expect(pet.getPendingTasks()).toEqual([]);
    expect(pet.taskCount).toBe(0);
  });

  it('adds tasks and rejects duplicate ids', () => {
    const pet = new Pet({ name: 'Rex', species: 'dog' });
    expect(pet.addTask(makeTask({ id: 'walk', title: 'Walk' }))).toEqual({ type: 'success', message: 'Added task (walk) Walk to Rex' });
    expect(pet.addTask(makeTask({ id: 'walk', title: 'Other' }))).toEqual({ type: 'error', message: 'Task walk already exists for Rex' });
    expect(pet.taskCount).toBe(1);
    expect(pet.getTask('walk')?.title).toBe('Walk');
  });

  it('removes tasks by id', () => {
    const pet = new Pet({ name: 'Rex', species: 'dog' });
    pet.addTask(makeTask({ id: 'walk' }));
    expect(pet.removeTask('walk')).toBe(true);
    expect(pet.removeTask('walk')).toBe(false);
    expect(pet.hasTask('walk')).toBe(false);
  });

  it('replaces tasks in place', () => {
    const pet = new Pet({ name: 'Rex', species: 'dog' });
    pet.addTask(makeTask({ id: 'a' }));
    pet.addTask(makeTask({ id: 'b' }));
    const doneA = markCompleted(makeTask({ id: 'a' }), '2026-10-19');
    expect(pet.replaceTask(doneA)).toBe(true);
    expect(pet.getTasks().map(t => t.id)).toEqual(['a', 'b']);
    expect(pet.replaceTask(makeTask({ id: 'zzz' }))).toBe(false);
  });

  it('filters completed tasks when asked', () => {
    const pet = new Pet({ name: 'Rex', species: 'dog' });
    pet.addTask(markCompleted(makeTask({ id: 'a' }), '2026-10-19'));
    pet.addTask(makeTask({ id: 'b' }));
    expect(pet.getTasks(true).map(t => t.id)).toEqual(['a', 'b']);
    expect(pet.getTasks(false).map(t => t.id)).toEqual(['b']);
    expect(pet.getPendingTasks().map(t => t.id)).toEqual(['b']);
  });
});
