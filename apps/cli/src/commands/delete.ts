import { Command } from 'commander';
import * as out from '../output.js';
import { $try, forEachTaskId } from '../helpers.js';
import type { SessionProvider } from '../types.js';

export function createDeleteCommand(getSession: SessionProvider): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => $try(() => {
      const session = getSession();
      forEachTaskId(taskIds, id => out.printResult(session.remove(id), 'Deleted'));
    }));
}
