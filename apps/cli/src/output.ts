/**
 * chalk-based console output. Errors go to stderr, everything else to stdout.
 */

import chalk from 'chalk';
import { isOverdue, isSuccess } from '@plaintask/core';
import type { ListedTask, TaskResult } from '@plaintask/core';

// --- Listing ---

/** Completed rows are struck through in green, overdue rows are red */
export function styleTaskRow(line: string, row: ListedTask, now: Date = new Date()): string {
  if (row.task.complete) return chalk.green.strikethrough(line);
  if (isOverdue(row.task, now)) return chalk.red(line);
  return line;
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  if (isSuccess(result)) success(result.message);
  else info(result.message);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.warn(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
