import { Command } from 'commander';
import { Scheduler, successCount } from '@pawplan/core';
import type { OpResult } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createRemoveCommand(store: HouseholdStore): Command {
  return new Command('remove')
    .description('Remove one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to remove')
    .action((taskIds: string[]) => $try(() => {
      const owner = store.load();
      const scheduler = new Scheduler(owner);

      const results = taskIds.map((id): OpResult => {
        const found = scheduler.findTask(id);
        if (!found) return { type: 'not-found', id };
        found.pet.removeTask(id);
        return { type: 'success', message: `Removed (${id}) ${found.task.title} from ${found.pet.name}` };
      });

      const batch = { results };
      out.printBatchResults(batch);
      if (successCount(batch) > 0) store.save(owner);
    }));
}
