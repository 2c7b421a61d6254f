import type { Task } from '../types/task.js';
import type { OpResult } from '../types/results.js';
import type { Pet } from './pet.js';
import { ValidationError } from '../errors.js';

export interface OwnerPreferences {
  readonly preferredTaskTypes: ReadonlySet<string>;
  readonly avoidTaskTypes: ReadonlySet<string>;
  readonly preferredTags: ReadonlySet<string>;
  readonly avoidTags: ReadonlySet<string>;
  /** Upper bound on tasks per schedule, null for no limit */
  readonly maxTasks: number | null;
}

export interface OwnerPreferencesInit {
  preferredTaskTypes?: Iterable<string>;
  avoidTaskTypes?: Iterable<string>;
  preferredTags?: Iterable<string>;
  avoidTags?: Iterable<string>;
  maxTasks?: number | null;
}

export interface OwnerOptions {
  availableTimeMinutes?: number;
  preferences?: OwnerPreferencesInit;
}

function validateMinutes(minutes: number): number {
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new ValidationError('available time', `must be a non-negative whole number of minutes, got ${minutes}`);
  }
  return minutes;
}

function buildPreferences(init: OwnerPreferencesInit, base?: OwnerPreferences): OwnerPreferences {
  const maxTasks = init.maxTasks !== undefined ? init.maxTasks : base?.maxTasks ?? null;
  if (maxTasks !== null && (!Number.isInteger(maxTasks) || maxTasks < 0)) {
    throw new ValidationError('max tasks', `must be a non-negative whole number, got ${maxTasks}`);
  }
  return {
    preferredTaskTypes: new Set(init.preferredTaskTypes ?? base?.preferredTaskTypes ?? []),
    avoidTaskTypes: new Set(init.avoidTaskTypes ?? base?.avoidTaskTypes ?? []),
    preferredTags: new Set(init.preferredTags ?? base?.preferredTags ?? []),
    avoidTags: new Set(init.avoidTags ?? base?.avoidTags ?? []),
    maxTasks,
  };
}

/** The pet owner: their time budget, preferences and pets (by name, insertion order) */
export class Owner {
  readonly name: string;
  private _availableTimeMinutes: number;
  private _preferences: OwnerPreferences;
  private petsByName = new Map<string, Pet>();

  constructor(name: string, options: OwnerOptions = {}) {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError('owner name', 'must not be empty');
    this.name = trimmed;
    this._availableTimeMinutes = validateMinutes(options.availableTimeMinutes ?? 0);
    this._preferences = buildPreferences(options.preferences ?? {});
  }

  get availableTimeMinutes(): number { return this._availableTimeMinutes; }
  get preferences(): OwnerPreferences { return this._preferences; }
  get pets(): readonly Pet[] { return [...this.petsByName.values()]; }

  setAvailableTime(minutes: number): void {
    this._availableTimeMinutes = validateMinutes(minutes);
  }

  /** Merge the given fields into the current preferences */
  setPreferences(preferences: OwnerPreferencesInit): void {
    this._preferences = buildPreferences(preferences, this._preferences);
  }

  addPet(pet: Pet): OpResult {
    if (this.petsByName.has(pet.name)) {
      return { type: 'error', message: `A pet named ${pet.name} already exists` };
    }
    this.petsByName.set(pet.name, pet);
    return { type: 'success', message: `Added ${pet.name} (${pet.species})` };
  }

  /** Remove a pet (and with it, its tasks). Returns true if removed. */
  removePet(name: string): boolean {
    return this.petsByName.delete(name);
  }

  getPet(name: string): Pet | null {
    return this.petsByName.get(name) ?? null;
  }

  getAllTasks(includeCompleted = true): Task[] {
    return this.pets.flatMap(pet => pet.getTasks(includeCompleted));
  }
}
