import { Command } from 'commander';
import {
  Scheduler, createTask, generateId, isSuccess,
  parsePriority, parseRecurrence, parseTime, Recurrence,
} from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, parseListArg, parseWholeNumberArg } from '../helpers.js';

type AddOptions = {
  duration: string;
  priority: string;
  type: string;
  at?: string;
  every?: string;
  id?: string;
  description?: string;
  species?: string;
  tags?: string;
  after?: string;
  specialNeeds?: boolean;
};

export function createAddCommand(store: HouseholdStore): Command {
  return new Command('add')
    .description('Add a care task to a pet')
    .argument('<pet>', 'The pet the task belongs to')
    .argument('<title>', 'Short task title')
    .requiredOption('--duration <minutes>', 'How long the task takes')
    .option('-p, --priority <level>', 'low, medium, high, critical (or p1..p4)', 'medium')
    .option('-t, --type <type>', 'Task category, e.g. walk, feeding, grooming', 'general')
    .option('--at <HH:mm>', 'Fixed start time')
    .option('-e, --every <rule>', 'Repeat: daily, weekly, every:<n> or <n>d')
    .option('--id <id>', 'Task id (generated when omitted)')
    .option('--description <text>', 'Longer description')
    .option('--species <list>', 'Comma-separated species the task applies to')
    .option('--tags <list>', 'Comma-separated preference tags')
    .option('--after <ids>', 'Comma-separated ids of tasks that must come first')
    .option('--special-needs', 'Only for pets with special needs')
    .action((petName: string, title: string, opts: AddOptions) => $try(() => {
      const owner = store.load();
      const pet = owner.getPet(petName);
      if (!pet) {
        out.error(`Could not find a pet named ${petName}`);
        return;
      }

      const priority = parsePriority(opts.priority);
      if (priority === null) {
        out.error(`Invalid priority: ${opts.priority}. Use low, medium, high, critical or p1..p4`);
        return;
      }

      const startTimeMinutes = opts.at !== undefined ? parseTime(opts.at) : null;
      if (opts.at !== undefined && startTimeMinutes === null) {
        out.error(`Invalid start time: ${opts.at}. Use HH:mm`);
        return;
      }

      const recurrence = opts.every !== undefined ? parseRecurrence(opts.every) : Recurrence.None;
      if (recurrence === null) {
        out.error(`Invalid repeat rule: ${opts.every}. Use daily, weekly, every:<n> or <n>d`);
        return;
      }

      const scheduler = new Scheduler(owner);
      const usedIds = new Set(scheduler.getAllTasks().map(t => t.id));
      if (opts.id !== undefined && usedIds.has(opts.id)) {
        out.error(`Task id ${opts.id} is already in use`);
        return;
      }
      let id = opts.id ?? generateId();
      while (usedIds.has(id)) id = generateId();

      const dependsOn = opts.after !== undefined ? parseListArg(opts.after) : [];
      for (const dep of dependsOn) {
        if (!usedIds.has(dep)) out.warning(`No task with id ${dep} yet; ${title} will wait until it exists`);
      }

      const task = createTask({
        id,
        title,
        description: opts.description,
        durationMinutes: parseWholeNumberArg(opts.duration),
        priority,
        taskType: opts.type,
        startTimeMinutes,
        recurrence,
        applicableSpecies: opts.species !== undefined ? parseListArg(opts.species) : [],
        preferenceTags: opts.tags !== undefined ? parseListArg(opts.tags) : [],
        dependsOn,
        requiresSpecialNeeds: opts.specialNeeds ?? false,
      });

      const result = pet.addTask(task);
      out.printResult(result);
      if (isSuccess(result)) store.save(owner);
    }));
}
