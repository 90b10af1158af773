import { Command } from 'commander';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { SessionProvider } from '../types.js';

export function createAddCommand(getSession: SessionProvider): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-d, --description <text>', 'Longer description', '')
    .action((title: string, opts: { description: string }) => $try(() => {
      out.printResult(getSession().create(title, opts.description), 'Added');
    }));
}
