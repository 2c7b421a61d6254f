import { Command } from 'commander';
import chalk from 'chalk';
import { Schedule } from '@pawplan/core';
import type { Owner, Pet, IsoDate } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, getGlobals, parseWholeNumberArg, resolveReferenceDate } from '../helpers.js';

type PlanOptions = { minutes?: string };

function printSchedule(owner: Owner, pet: Pet, date: IsoDate): void {
  const schedule = new Schedule(date, owner, pet);
  schedule.generateSchedule();

  console.log(chalk.bold.underline(`${pet.name} (${date})`));

  const scheduled = schedule.getScheduledTasks();
  if (scheduled.length === 0) {
    out.info('No tasks could be scheduled with the current constraints');
  }
  for (const task of scheduled) {
    console.log(`  ${out.formatTaskLine(task)}`);
  }

  const total = schedule.calculateTotalTime();
  out.info(`Total: ${out.formatMinutes(total)} of ${out.formatMinutes(owner.availableTimeMinutes)} (${out.formatMinutes(schedule.remainingMinutes)} left)`);

  if (!schedule.validateSchedule()) {
    out.warning('This schedule exceeds the available time or has overlapping tasks');
  }
  for (const conflict of schedule.getConflicts()) {
    out.warning(`Conflict: ${conflict.task.title} overlaps ${conflict.conflictsWith.title}`);
  }

  const explanation = schedule.getExplanation();
  if (explanation) {
    console.log(chalk.bold('Why:'));
    for (const line of explanation.split('\n')) {
      console.log(`  ${chalk.dim(line)}`);
    }
  }
}

export function createPlanCommand(store: HouseholdStore): Command {
  return new Command('plan')
    .description("Build the day's schedule for one pet or every pet")
    .argument('[pet]', 'Only plan for this pet')
    .option('-m, --minutes <n>', 'Override the available minutes for this plan only')
    .action((petName: string | undefined, opts: PlanOptions, cmd: Command) => $try(() => {
      const owner = store.load();
      const date = resolveReferenceDate(getGlobals(cmd).date);
      if (opts.minutes !== undefined) owner.setAvailableTime(parseWholeNumberArg(opts.minutes));

      let pets: readonly Pet[] = owner.pets;
      if (petName !== undefined) {
        const pet = owner.getPet(petName);
        if (!pet) {
          out.error(`Could not find a pet named ${petName}`);
          return;
        }
        pets = [pet];
      }

      if (pets.length === 0) {
        out.info('No pets yet... use the add-pet command to add one');
        return;
      }

      pets.forEach((pet, i) => {
        if (i > 0) console.log();
        printSchedule(owner, pet, date);
      });
    }));
}
