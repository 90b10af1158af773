import { Command } from 'commander';
import { openTaskSession } from '@todo-simple/core';
import type { TaskSession } from '@todo-simple/core';
import { resolveTasksPath } from './config.js';
import { $try } from './helpers.js';
import type { SessionProvider } from './types.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand, printTaskList } from './commands/list.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createStatusCommand } from './commands/status.js';

export interface ProgramOptions {
  open?: (filePath: string) => TaskSession;
  env?: NodeJS.ProcessEnv;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const open = options.open ?? openTaskSession;

  const program = new Command()
    .name('todo')
    .description('Simple single-user task list')
    .version('1.0.0')
    .option('-f, --file <path>', 'Tasks file (default: ~/.todo_simple/tasks.txt)')
    // a mistyped command must not fall through to the default list action
    .allowExcessArguments(false);

  let session: TaskSession | null = null;
  const getSession: SessionProvider = () => {
    if (!session) {
      const g = program.opts<{ file?: string }>();
      session = open(resolveTasksPath(g.file, options.env));
    }
    return session;
  };

  // Register commands
  program.addCommand(createListCommand(getSession));
  program.addCommand(createAddCommand(getSession));
  program.addCommand(createCheckCommand(getSession));
  program.addCommand(createUncheckCommand(getSession));
  program.addCommand(createDeleteCommand(getSession));
  program.addCommand(createStatusCommand(getSession));

  // Default action (no command): show task list
  program.action(() => $try(() => printTaskList(getSession())));

  return program;
}
