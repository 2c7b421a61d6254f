import { Command } from 'commander';
import { Owner } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, parseWholeNumberArg } from '../helpers.js';

type InitOptions = { owner: string; minutes: string; force?: boolean };

export function createInitCommand(store: HouseholdStore): Command {
  return new Command('init')
    .description('Create an empty household file')
    .option('-o, --owner <name>', 'Owner name', 'Owner')
    .option('-m, --minutes <n>', 'Minutes available for pet care each day', '60')
    .option('--force', 'Replace an existing household')
    .action((opts: InitOptions) => $try(() => {
      if (store.exists() && !opts.force) {
        out.error(`A household already exists at ${store.location}. Use --force to replace it`);
        return;
      }

      const owner = new Owner(opts.owner, { availableTimeMinutes: parseWholeNumberArg(opts.minutes) });
      store.save(owner);
      out.success(`Created household for ${owner.name} at ${store.location}`);
    }));
}
