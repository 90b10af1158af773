/**
 * CLI helpers: error handling and id parsing.
 */

import type { TaskId } from '@todo-simple/core';
import * as out from './output.js';

const TASK_ID_RE = /^\d+$/;

/** Parse a command-line task id, or null when it is not a whole number */
export function parseTaskId(arg: string): TaskId | null {
  const trimmed = arg.trim();
  if (!TASK_ID_RE.test(trimmed)) return null;
  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Run a command body, printing any thrown error instead of a stack trace.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}

/** Apply `fn` to each id argument, reporting the ones that are not numbers */
export function forEachTaskId(args: string[], fn: (id: TaskId) => void): void {
  for (const arg of args) {
    const id = parseTaskId(arg);
    if (id === null) {
      out.error(`Invalid task id: ${arg}`);
      continue;
    }
    fn(id);
  }
}
