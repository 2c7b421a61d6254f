import { Command } from 'commander';
import chalk from 'chalk';
import { Pet, isSuccess } from '@pawplan/core';
import type { HouseholdStore } from '../store.js';
import * as out from '../output.js';
import { $try, parseListArg, parseWholeNumberArg } from '../helpers.js';

export function createPetsCommand(store: HouseholdStore): Command {
  return new Command('pets')
    .description('List pets')
    .action(() => $try(() => {
      const owner = store.load();
      if (owner.pets.length === 0) {
        out.info('No pets yet... use the add-pet command to add one');
        return;
      }

      for (const pet of owner.pets) {
        const needs = pet.hasSpecialNeeds() ? chalk.magenta(`  needs: ${pet.specialNeeds.join(', ')}`) : '';
        const pending = pet.getPendingTasks().length;
        console.log(`${chalk.bold(pet.name)} ${chalk.dim(`(${pet.species}, ${pet.age}y)`)}  ${pending}/${pet.taskCount} tasks pending${needs}`);
      }
    }));
}

type AddPetOptions = { age?: string; specialNeeds?: string };

export function createAddPetCommand(store: HouseholdStore): Command {
  return new Command('add-pet')
    .description('Add a pet to the household')
    .argument('<name>', 'Pet name (unique within the household)')
    .argument('<species>', 'Species, e.g. dog or cat')
    .option('--age <years>', 'Age in years')
    .option('--special-needs <list>', 'Comma-separated special needs')
    .action((name: string, species: string, opts: AddPetOptions) => $try(() => {
      const owner = store.load();
      const pet = new Pet({
        name,
        species,
        age: opts.age !== undefined ? parseWholeNumberArg(opts.age, 'years') : 0,
        specialNeeds: opts.specialNeeds !== undefined ? parseListArg(opts.specialNeeds) : [],
      });

      const result = owner.addPet(pet);
      out.printResult(result);
      if (isSuccess(result)) store.save(owner);
    }));
}

export function createRemovePetCommand(store: HouseholdStore): Command {
  return new Command('remove-pet')
    .description('Remove a pet and all its tasks')
    .argument('<name>', 'The name of the pet to remove')
    .action((name: string) => $try(() => {
      const owner = store.load();
      if (!owner.removePet(name)) {
        out.error(`Could not find a pet named ${name}`);
        return;
      }
      store.save(owner);
      out.success(`Removed ${name} and its tasks`);
    }));
}
