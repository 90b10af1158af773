import { resolve } from 'node:path';
import { getDefaultTasksPath } from '@todo-simple/core';

export const TASKS_FILE_ENV = 'TODO_SIMPLE_FILE';

/**
 * Resolve the tasks file.
 * Priority: --file > TODO_SIMPLE_FILE > ~/.todo_simple/tasks.txt
 */
export function resolveTasksPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit) return resolve(explicit);
  const fromEnv = env[TASKS_FILE_ENV];
  if (fromEnv) return resolve(fromEnv);
  return getDefaultTasksPath();
}
