import { Command } from 'commander';
import * as out from '../output.js';
import { $try, forEachTaskId } from '../helpers.js';
import type { SessionProvider } from '../types.js';

export function createCheckCommand(getSession: SessionProvider): Command {
  return new Command('check')
    .description('Check one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to check')
    .action((taskIds: string[]) => $try(() => {
      const session = getSession();
      forEachTaskId(taskIds, id => out.printResult(session.setCompleted(id, true), 'Checked'));
    }));
}

export function createUncheckCommand(getSession: SessionProvider): Command {
  return new Command('uncheck')
    .description('Uncheck one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to uncheck')
    .action((taskIds: string[]) => $try(() => {
      const session = getSession();
      forEachTaskId(taskIds, id => out.printResult(session.setCompleted(id, false), 'Unchecked'));
    }));
}
