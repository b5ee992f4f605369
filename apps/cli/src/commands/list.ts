import { Command } from 'commander';
import { renderTaskTable } from '@plaintask/core';
import type { ListedTask } from '@plaintask/core';
import * as out from '../output.js';
import { $try, normalizeTags, parseCount } from '../helpers.js';
import type { StoreOpener } from '../helpers.js';

interface ListOptions {
  all?: boolean;
  overdue?: boolean;
  tags?: string[];
  matchAll?: boolean;
  number?: number;
}

export function createListCommand(openStore: StoreOpener): Command {
  return new Command('list')
    .description('Show tasks (incomplete only, unless --all)')
    .option('-a, --all', 'Include completed tasks')
    .option('-o, --overdue', 'Show only overdue tasks')
    .option('-t, --tags <tags...>', 'Show only tasks with any of these tags')
    .option('--match-all', 'With --tags, require every tag instead of any')
    .option('-n, --number <count>', 'Show only the next <count> tasks due', parseCount)
    .action((opts: ListOptions, cmd: Command) => $try(() => {
      const tags = normalizeTags(opts.tags);
      if (opts.matchAll && !tags) {
        out.warning('--match-all has no effect without --tags');
      }

      const now = new Date();
      const rows = openStore(cmd).query({
        all: opts.all ?? false,
        overdue: opts.overdue ?? false,
        tags,
        tagMatch: opts.matchAll ? 'all' : 'any',
        limit: opts.number,
        now,
      });

      if (rows.length === 0) {
        out.info(emptyMessage(opts));
        return;
      }

      console.log(renderTaskTable(rows, {
        showIds: !opts.all,
        styleRow: (line: string, row: ListedTask) => out.styleTaskRow(line, row, now),
      }));
    }));
}

function emptyMessage(opts: ListOptions): string {
  if (opts.overdue) return 'No overdue tasks';
  if (opts.tags) return 'No tasks match those tags';
  return 'No tasks saved yet... use the add command to create one';
}
