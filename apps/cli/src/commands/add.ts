import { Command } from 'commander';
import { formatDeadline, isValidTaskName, parseDeadline } from '@plaintask/core';
import * as out from '../output.js';
import { $try, normalizeTags } from '../helpers.js';
import type { StoreOpener } from '../helpers.js';

interface AddOptions {
  tags?: string[];
  deadline?: string;
}

export function createAddCommand(openStore: StoreOpener): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<name>', 'Name of the task')
    .option('-t, --tags <tags...>', 'Tag(s) to categorize the task')
    .option(
      '-d, --deadline <when>',
      'Deadline: "2025-03-17 18:30", "2025-03-17", "18:30", "friday", "+2d" (default: today 17:00)',
    )
    .action((name: string, opts: AddOptions, cmd: Command) => $try(() => {
      const taskName = name.trim();
      if (!isValidTaskName(taskName)) {
        throw new Error(`Invalid task name '${name}': names must be non-empty and cannot contain '|' or line breaks`);
      }

      const deadline = parseDeadline(opts.deadline);
      if (!deadline) {
        throw new Error(`Could not understand deadline '${opts.deadline ?? ''}'`);
      }

      const task = openStore(cmd).add({ name: taskName, tags: normalizeTags(opts.tags), deadline });
      out.success(`Task '${task.name}' added, due ${formatDeadline(task.deadline)}`);
    }));
}
