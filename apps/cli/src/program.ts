import { Command } from 'commander';
import { DEFAULT_TASK_FILE, TASK_FILE_ENV } from '@plaintask/core';
import { openTaskStore } from './helpers.js';
import type { StoreOpener } from './helpers.js';

import { createAddCommand } from './commands/add.js';
import { createCompleteCommand } from './commands/complete.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand } from './commands/list.js';

/** Build the CLI program. Tests pass their own opener to target a temp file. */
export function createProgram(openStore: StoreOpener = openTaskStore): Command {
  const program = new Command()
    .name('plaintask')
    .description('A todo CLI that keeps tasks in a plain text file')
    .version('0.3.0')
    .option('-f, --file <path>', `Task file (default: $${TASK_FILE_ENV} or ${DEFAULT_TASK_FILE})`);

  program.addCommand(createAddCommand(openStore));
  program.addCommand(createCompleteCommand(openStore));
  program.addCommand(createDeleteCommand(openStore));
  // No command: show the task list
  program.addCommand(createListCommand(openStore), { isDefault: true });

  return program;
}
