/**
 * chalk-based output formatting. The CLI's only logging surface.
 */

import chalk from 'chalk';
import { Priority, formatTime, recurrenceLabel } from '@pawplan/core';
import type { Task, OpResult, BatchResult } from '@pawplan/core';

// --- Tag colors (deterministic from tag name) ---

const TAG_COLORS = [
  chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow,
  chalk.green, chalk.red, chalk.white, chalk.gray,
];

function tagColor(tag: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < tag.length; i++) {
    hash = ((hash << 5) - hash + tag.charCodeAt(i)) | 0;
  }
  return TAG_COLORS[Math.abs(hash) % TAG_COLORS.length] ?? chalk.white;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.Critical: return chalk.red.bold('!!!');
    case Priority.High: return chalk.red('>>>');
    case Priority.Medium: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatStartTime(startTimeMinutes: number | null): string {
  return startTimeMinutes === null ? chalk.dim('--:--') : chalk.cyan(formatTime(startTimeMinutes));
}

export function formatRecurrence(task: Task): string {
  if (task.recurrence.kind === 'none') return '';
  return chalk.dim(`  (${recurrenceLabel(task.recurrence)})`);
}

export function formatTags(tags: ReadonlySet<string>): string {
  if (tags.size === 0) return '';
  const formatted = [...tags].map(t => tagColor(t)(`#${t}`));
  return '  ' + formatted.join(' ');
}

export function formatDependencies(task: Task): string {
  if (task.dependsOn.size === 0) return '';
  return chalk.dim(`  after ${[...task.dependsOn].join(', ')}`);
}

/** One task per line: checkbox, time, priority, id, title, duration, then extras */
export function formatTaskLine(task: Task): string {
  return [
    formatCheckbox(task.completed),
    formatStartTime(task.startTimeMinutes),
    formatPriority(task.priority),
    chalk.dim(`(${task.id})`),
    task.completed ? chalk.dim.strikethrough(task.title) : chalk.bold(task.title),
    chalk.dim(`${task.durationMinutes}m`),
  ].join(' ') + formatRecurrence(task) + formatTags(task.preferenceTags) + formatDependencies(task);
}

export function formatMinutes(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  if (hours === 0) return `${rest}m`;
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

// --- Result output ---

export function printResult(result: OpResult): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.id}`); break;
    case 'no-change': info(result.message); break;
    case 'error': error(result.message); break;
  }
}

export function printBatchResults(batch: BatchResult): void {
  for (const result of batch.results) {
    printResult(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

/** Print in red and make the process exit non-zero */
export function error(message: string): void {
  console.log(chalk.red(message));
  process.exitCode = 1;
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
