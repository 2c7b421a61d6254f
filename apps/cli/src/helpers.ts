/**
 * CLI helpers: global options, argument parsing, error handling.
 */

import type { Command } from 'commander';
import { PawPlanError, parseDate } from '@pawplan/core';
import type { IsoDate, StatusFilter } from '@pawplan/core';
import * as out from './output.js';

/** Options declared on the root program */
export type GlobalOptions = {
  file?: string;
  date?: string;
};

export function getGlobals(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

/**
 * Resolve the reference date for a command.
 * Accepts everything parseDate does; defaults to today.
 */
export function resolveReferenceDate(input: string | undefined, now: Date = new Date()): IsoDate {
  const date = parseDate(input ?? 'today', now);
  if (date === null) {
    throw new PawPlanError(`Could not understand the date '${input}'. Try today, +3d, fri, jan15 or yyyy-MM-dd`);
  }
  return date;
}

/**
 * Parse a status string into a StatusFilter value.
 */
export function parseStatusFilter(status: string): StatusFilter | null {
  switch (status.toLowerCase()) {
    case 'pending': case 'todo': case 'open': return 'pending';
    case 'done': case 'complete': case 'completed': return 'completed';
    case 'all': case 'any': return 'any';
    default: return null;
  }
}

/** Split a comma-separated option value, dropping blanks */
export function parseListArg(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/** Parse a whole, non-negative number (minutes unless told otherwise) */
export function parseWholeNumberArg(value: string, unit = 'minutes'): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new PawPlanError(`Expected a whole number of ${unit}, got '${value}'`);
  }
  return parseInt(trimmed, 10);
}

/**
 * Wrap a command action with error handling. A thrown error is printed
 * and leaves a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}
