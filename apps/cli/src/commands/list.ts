import { Command } from 'commander';
import type { TaskSession } from '@todo-simple/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { SessionProvider } from '../types.js';

export function printTaskList(session: TaskSession): void {
  const tasks = session.list();
  if (tasks.length === 0) {
    out.info('No tasks yet. Use the add command to create one');
    return;
  }
  for (const task of tasks) out.info(out.formatTask(task));
}

export function createListCommand(getSession: SessionProvider): Command {
  return new Command('list')
    .description('List all tasks, unfinished first')
    .action(() => $try(() => printTaskList(getSession())));
}
