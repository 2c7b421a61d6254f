import { Command } from 'commander';
import { Scheduler } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, getGlobals, resolveReferenceDate } from '../helpers.js';

type ConflictOptions = { all?: boolean };

export function createConflictsCommand(store: HouseholdStore): Command {
  return new Command('conflicts')
    .description('Warn about pending tasks that start at the same time')
    .option('-a, --all', 'Check every pending task, not only those due on the reference date')
    .action((opts: ConflictOptions, cmd: Command) => $try(() => {
      const owner = store.load();
      const date = opts.all ? undefined : resolveReferenceDate(getGlobals(cmd).date);

      const reports = new Scheduler(owner).detectTimeConflicts({ date });
      if (reports.length === 0) {
        out.success('No time conflicts detected for pending tasks');
        return;
      }
      for (const report of reports) {
        out.warning(report.message);
      }
    }));
}
