import { Command } from 'commander';
import { Scheduler, successCount } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, getGlobals, resolveReferenceDate } from '../helpers.js';

export function createCompleteCommand(store: HouseholdStore): Command {
  return new Command('complete')
    .description('Mark tasks done on the reference date; recurring tasks get their next occurrence')
    .argument('<taskIds...>', 'The id(s) of the task(s) to complete')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(() => {
      const owner = store.load();
      const date = resolveReferenceDate(getGlobals(cmd).date);

      const batch = new Scheduler(owner).markTasksCompleted(taskIds, date);
      out.printBatchResults(batch);
      if (successCount(batch) > 0) store.save(owner);
    }));
}
