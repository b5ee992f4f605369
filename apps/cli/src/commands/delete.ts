import { Command } from 'commander';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { StoreOpener } from '../helpers.js';

export function createDeleteCommand(openStore: StoreOpener): Command {
  return new Command('delete')
    .description('Remove a task')
    .argument('<id>', 'Id of the task, as shown by list', parseTaskId)
    .action((id: number, _opts: unknown, cmd: Command) => $try(() => {
      out.printResult(openStore(cmd).delete(id));
    }));
}
