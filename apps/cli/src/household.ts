/**
 * Household file codec. The file is plain JSON; every field is checked by
 * hand and reported with its path so a broken file points at the bad entry.
 */

import {
  Owner, Pet, PawPlanError, ValidationError,
  createTask, parsePriority, parseRecurrence, recurrenceLabel,
  parseTime, formatTime, PriorityName,
} from '@pawplan/core';
import type { Task, OwnerPreferencesInit } from '@pawplan/core';

export const HOUSEHOLD_VERSION = 1;

export interface TaskRecord {
  id: string;
  title: string;
  description: string;
  durationMinutes: number;
  priority: string;
  taskType: string;
  completed: boolean;
  startTime: string | null;
  recurrence: string;
  lastCompletedDate: string | null;
  applicableSpecies: string[];
  preferenceTags: string[];
  dependsOn: string[];
  requiresSpecialNeeds: boolean;
}

export interface PetRecord {
  name: string;
  species: string;
  age: number;
  specialNeeds: string[];
  tasks: TaskRecord[];
}

export interface PreferencesRecord {
  preferredTaskTypes: string[];
  avoidTaskTypes: string[];
  preferredTags: string[];
  avoidTags: string[];
  maxTasks: number | null;
}

export interface HouseholdFile {
  version: number;
  owner: {
    name: string;
    availableTimeMinutes: number;
    preferences: PreferencesRecord;
  };
  pets: PetRecord[];
}

export class HouseholdFormatError extends PawPlanError {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = 'HouseholdFormatError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new HouseholdFormatError(path, 'expected an object');
  return value;
}

function readString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new HouseholdFormatError(`${path}.${key}`, 'expected a string');
  return value;
}

function readOptionalString(obj: JsonObject, key: string, path: string): string | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') throw new HouseholdFormatError(`${path}.${key}`, 'expected a string or null');
  return value;
}

function readInteger(obj: JsonObject, key: string, path: string, fallback?: number): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new HouseholdFormatError(`${path}.${key}`, 'expected a whole number');
  }
  return value;
}

function readBoolean(obj: JsonObject, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') throw new HouseholdFormatError(`${path}.${key}`, 'expected true or false');
  return value;
}

function readStringList(obj: JsonObject, key: string, path: string): string[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new HouseholdFormatError(`${path}.${key}`, 'expected a list of strings');
  return value.map((item: unknown, i) => {
    if (typeof item !== 'string') throw new HouseholdFormatError(`${path}.${key}[${i}]`, 'expected a string');
    return item;
  });
}

function readList(obj: JsonObject, key: string, path: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new HouseholdFormatError(`${path}.${key}`, 'expected a list');
  return value;
}

/** Run a model constructor, re-raising its validation errors at the given path */
function atPath<T>(path: string, build: () => T): T {
  try {
    return build();
  } catch (err: unknown) {
    if (err instanceof ValidationError) throw new HouseholdFormatError(path, err.message);
    throw err;
  }
}

function parseTaskRecord(value: unknown, path: string): Task {
  const obj = expectObject(value, path);

  const priorityLabel = readString(obj, 'priority', path);
  const priority = parsePriority(priorityLabel);
  if (priority === null) throw new HouseholdFormatError(`${path}.priority`, `unknown priority '${priorityLabel}'`);

  const recurrenceText = readOptionalString(obj, 'recurrence', path) ?? 'none';
  const recurrence = parseRecurrence(recurrenceText);
  if (recurrence === null) throw new HouseholdFormatError(`${path}.recurrence`, `unknown recurrence '${recurrenceText}'`);

  const startText = readOptionalString(obj, 'startTime', path);
  const startTimeMinutes = startText === null ? null : parseTime(startText);
  if (startText !== null && startTimeMinutes === null) {
    throw new HouseholdFormatError(`${path}.startTime`, `expected HH:mm, got '${startText}'`);
  }

  return atPath(path, () => createTask({
    id: readString(obj, 'id', path),
    title: readString(obj, 'title', path),
    description: readOptionalString(obj, 'description', path) ?? undefined,
    durationMinutes: readInteger(obj, 'durationMinutes', path),
    priority,
    taskType: readString(obj, 'taskType', path),
    completed: readBoolean(obj, 'completed', path, false),
    startTimeMinutes,
    recurrence,
    lastCompletedDate: readOptionalString(obj, 'lastCompletedDate', path),
    applicableSpecies: readStringList(obj, 'applicableSpecies', path),
    preferenceTags: readStringList(obj, 'preferenceTags', path),
    dependsOn: readStringList(obj, 'dependsOn', path),
    requiresSpecialNeeds: readBoolean(obj, 'requiresSpecialNeeds', path, false),
  }));
}

function parsePetRecord(value: unknown, path: string): Pet {
  const obj = expectObject(value, path);
  const pet = atPath(path, () => new Pet({
    name: readString(obj, 'name', path),
    species: readString(obj, 'species', path),
    age: readInteger(obj, 'age', path, 0),
    specialNeeds: readStringList(obj, 'specialNeeds', path),
  }));

  readList(obj, 'tasks', path).forEach((item, i) => {
    const taskPath = `${path}.tasks[${i}]`;
    const result = pet.addTask(parseTaskRecord(item, taskPath));
    if (result.type === 'error') throw new HouseholdFormatError(taskPath, result.message);
  });
  return pet;
}

function parsePreferences(value: unknown, path: string): OwnerPreferencesInit {
  if (value === undefined) return {};
  const obj = expectObject(value, path);
  const maxTasks = obj['maxTasks'];
  return {
    preferredTaskTypes: readStringList(obj, 'preferredTaskTypes', path),
    avoidTaskTypes: readStringList(obj, 'avoidTaskTypes', path),
    preferredTags: readStringList(obj, 'preferredTags', path),
    avoidTags: readStringList(obj, 'avoidTags', path),
    maxTasks: maxTasks === undefined || maxTasks === null ? null : readInteger(obj, 'maxTasks', path),
  };
}

/** Build an Owner (with pets and tasks) from parsed household JSON */
export function parseHousehold(data: unknown): Owner {
  const root = expectObject(data, '$');
  const version = readInteger(root, 'version', '$');
  if (version !== HOUSEHOLD_VERSION) {
    throw new HouseholdFormatError('$.version', `unsupported version ${version}`);
  }

  const ownerObj = expectObject(root['owner'], '$.owner');
  const owner = atPath('$.owner', () => new Owner(readString(ownerObj, 'name', '$.owner'), {
    availableTimeMinutes: readInteger(ownerObj, 'availableTimeMinutes', '$.owner', 0),
    preferences: parsePreferences(ownerObj['preferences'], '$.owner.preferences'),
  }));

  readList(root, 'pets', '$').forEach((item, i) => {
    const result = owner.addPet(parsePetRecord(item, `$.pets[${i}]`));
    if (result.type === 'error') throw new HouseholdFormatError(`$.pets[${i}]`, result.message);
  });

  return owner;
}

function serializeTask(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    durationMinutes: task.durationMinutes,
    priority: PriorityName[task.priority].toLowerCase(),
    taskType: task.taskType,
    completed: task.completed,
    startTime: task.startTimeMinutes === null ? null : formatTime(task.startTimeMinutes),
    recurrence: recurrenceLabel(task.recurrence),
    lastCompletedDate: task.lastCompletedDate,
    applicableSpecies: [...task.applicableSpecies],
    preferenceTags: [...task.preferenceTags],
    dependsOn: [...task.dependsOn],
    requiresSpecialNeeds: task.requiresSpecialNeeds,
  };
}

/** Inverse of parseHousehold */
export function serializeHousehold(owner: Owner): HouseholdFile {
  const prefs = owner.preferences;
  return {
    version: HOUSEHOLD_VERSION,
    owner: {
      name: owner.name,
      availableTimeMinutes: owner.availableTimeMinutes,
      preferences: {
        preferredTaskTypes: [...prefs.preferredTaskTypes],
        avoidTaskTypes: [...prefs.avoidTaskTypes],
        preferredTags: [...prefs.preferredTags],
        avoidTags: [...prefs.avoidTags],
        maxTasks: prefs.maxTasks,
      },
    },
    pets: owner.pets.map(pet => ({
      name: pet.name,
      species: pet.species,
      age: pet.age,
      specialNeeds: [...pet.specialNeeds],
      tasks: pet.getTasks(true).map(serializeTask),
    })),
  };
}
