import { Command } from 'commander';
import chalk from 'chalk';
import { Scheduler, sortTasks, isSortKey, isDueOn, SORT_KEYS } from '@pawplan/core';
import type { StatusFilter } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, getGlobals, parseStatusFilter, resolveReferenceDate } from '../helpers.js';

type ListOptions = {
  pet?: string;
  status: string;
  type?: string;
  sort: string;
  due?: boolean;
};

export function createListCommand(store: HouseholdStore): Command {
  return new Command('list')
    .description('List tasks, grouped by pet')
    .option('--pet <name>', 'Only this pet')
    .option('-s, --status <status>', 'pending, done or all', 'pending')
    .option('-t, --type <type>', 'Only tasks of this type')
    .option('--sort <key>', `One of: ${SORT_KEYS.join(', ')}`, 'time')
    .option('--due', 'Only tasks due on the reference date')
    .action((opts: ListOptions, cmd: Command) => $try(() => {
      const status: StatusFilter | null = parseStatusFilter(opts.status);
      if (status === null) {
        out.error(`Invalid status: ${opts.status}. Use pending, done or all`);
        return;
      }
      if (!isSortKey(opts.sort)) {
        out.error(`Invalid sort key: ${opts.sort}. Use one of: ${SORT_KEYS.join(', ')}`);
        return;
      }
      const sortBy = opts.sort;

      const owner = store.load();
      if (opts.pet !== undefined && !owner.getPet(opts.pet)) {
        out.error(`Could not find a pet named ${opts.pet}`);
        return;
      }

      const date = opts.due ? resolveReferenceDate(getGlobals(cmd).date) : null;
      const scheduler = new Scheduler(owner);
      const pets = opts.pet !== undefined ? owner.pets.filter(p => p.name === opts.pet) : owner.pets;

      let shown = 0;
      for (const pet of pets) {
        const matching = scheduler
          .filterTasks({ petName: pet.name, status, taskType: opts.type })
          .filter(t => date === null || isDueOn(t, date));
        if (matching.length === 0) continue;

        console.log(chalk.bold.underline(pet.name));
        for (const task of sortTasks(matching, sortBy)) {
          console.log(`  ${out.formatTaskLine(task)}`);
        }
        shown += matching.length;
      }

      if (shown === 0) {
        out.info('No tasks found... use the add command to create one');
      }
    }));
}
