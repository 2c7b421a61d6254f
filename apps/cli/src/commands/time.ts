import { Command } from 'commander';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, parseWholeNumberArg } from '../helpers.js';

export function createTimeCommand(store: HouseholdStore): Command {
  return new Command('time')
    .description('Set the minutes available for pet care each day')
    .argument('<minutes>', 'Available minutes')
    .action((minutes: string) => $try(() => {
      const owner = store.load();
      owner.setAvailableTime(parseWholeNumberArg(minutes));
      store.save(owner);
      out.success(`${owner.name} now has ${out.formatMinutes(owner.availableTimeMinutes)} available`);
    }));
}
