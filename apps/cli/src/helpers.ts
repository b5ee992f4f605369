/**
 * CLI helpers: store resolution, argument parsing, error handling.
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { PlainTextTaskStore, resolveTaskFilePath, isValidTag } from '@plaintask/core';
import type { TaskTracker } from '@plaintask/core';
import * as out from './output.js';

export type GlobalOptions = {
  file?: string;
};

/** Builds the tracker a command runs against */
export type StoreOpener = (cmd: Command) => TaskTracker;

/** Open the plain-text store named by --file, PLAINTASK_FILE or the default path */
export const openTaskStore: StoreOpener = (cmd) => {
  const { file } = cmd.optsWithGlobals<GlobalOptions>();
  return new PlainTextTaskStore(resolveTaskFilePath(file));
};

/** commander argument parser for task ids */
export function parseTaskId(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Task id must be a non-negative integer.');
  }
  return Number(value);
}

/** commander argument parser for row counts */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Count must be a non-negative integer.');
  }
  return Number(value);
}

/**
 * Split comma-separated tag arguments, trim and de-duplicate them.
 * Returns null when no tags remain.
 */
export function normalizeTags(raw: readonly string[] | undefined): string[] | null {
  if (!raw) return null;
  const tags = [...new Set(raw.flatMap(t => t.split(',')).map(t => t.trim()).filter(t => t !== ''))];
  const invalid = tags.find(t => !isValidTag(t));
  if (invalid !== undefined) throw new Error(`Invalid tag '${invalid}': tags cannot contain '|' or line breaks`);
  return tags.length > 0 ? tags : null;
}

/**
 * Run a command action, reporting any error on stderr and marking the
 * process as failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
