import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PawPlanError } from '@pawplan/core';
import type { Owner } from '@pawplan/core';
import { parseHousehold, serializeHousehold } from './household.js';

/** Where the household lives between CLI runs */
export interface HouseholdStore {
  /** Human-readable location for messages */
  readonly location: string;
  exists(): boolean;
  /** Throws PawPlanError when there is nothing to load or the file is unreadable */
  load(): Owner;
  save(owner: Owner): void;
}

export class FileHouseholdStore implements HouseholdStore {
  /** The path is resolved on each access so global options parsed late still apply */
  constructor(private readonly resolvePath: () => string) {}

  get location(): string {
    return this.resolvePath();
  }

  exists(): boolean {
    return existsSync(this.location);
  }

  load(): Owner {
    const path = this.location;
    if (!existsSync(path)) {
      throw new PawPlanError(`No household found at ${path}. Run the init command first`);
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PawPlanError(`Could not read ${path}: ${reason}`);
    }
    return parseHousehold(data);
  }

  save(owner: Owner): void {
    const path = this.location;
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, JSON.stringify(serializeHousehold(owner), null, 2) + '\n');
  }
}
