import { Command } from 'commander';
import type { HouseholdStore } from './store.js';

import { createInitCommand } from './commands/init.js';
import { createPetsCommand, createAddPetCommand, createRemovePetCommand } from './commands/pets.js';
import { createAddCommand } from './commands/add.js';
import { createRemoveCommand } from './commands/remove.js';
import { createListCommand } from './commands/list.js';
import { createConflictsCommand } from './commands/conflicts.js';
import { createCompleteCommand } from './commands/complete.js';
import { createPlanCommand } from './commands/plan.js';
import { createTimeCommand } from './commands/time.js';

export function createProgram(store: HouseholdStore): Command {
  const program = new Command()
    .name('pawplan')
    .description('Daily pet care planner')
    .version('1.0.0')
    .option('-f, --file <path>', 'Household file (default: $PAWPLAN_FILE, then the platform data directory)')
    .option('-d, --date <date>', 'Reference date: today, tomorrow, +3d, fri, jan15 or yyyy-MM-dd', 'today');

  // Register commands
  program.addCommand(createInitCommand(store));
  program.addCommand(createPetsCommand(store));
  program.addCommand(createAddPetCommand(store));
  program.addCommand(createRemovePetCommand(store));
  program.addCommand(createAddCommand(store));
  program.addCommand(createRemoveCommand(store));
  program.addCommand(createListCommand(store));
  program.addCommand(createConflictsCommand(store));
  program.addCommand(createCompleteCommand(store));
  program.addCommand(createPlanCommand(store));
  program.addCommand(createTimeCommand(store));

  // Default action (no command): show today's plan
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'plan')?.parse([], { from: 'user' });
  });

  return program;
}
