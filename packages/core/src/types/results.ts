import type { Task, TaskId } from './task.js';

/** Outcome of reading the tasks file. Never an exception. */
export type LoadResult =
  | { readonly type: 'missing'; readonly tasks: readonly Task[] }
  | { readonly type: 'loaded'; readonly tasks: readonly Task[]; readonly skipped: number }
  | { readonly type: 'unreadable'; readonly tasks: readonly Task[]; readonly message: string };

export type SaveResult =
  | { readonly type: 'success' }
  | { readonly type: 'error'; readonly message: string };

export type MutationResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly warnings: readonly string[] }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'error'; readonly message: string };

/** What happened at startup, without the tasks themselves */
export type LoadReport =
  | { readonly type: 'missing' | 'loaded'; readonly skipped: number }
  | { readonly type: 'unreadable'; readonly skipped: number; readonly message: string };

export function isSuccess<T>(r: MutationResult<T>): r is Extract<MutationResult<T>, { type: 'success' }> {
  return r.type === 'success';
}

export function toLoadReport(result: LoadResult): LoadReport {
  switch (result.type) {
    case 'missing': return { type: 'missing', skipped: 0 };
    case 'loaded': return { type: 'loaded', skipped: result.skipped };
    case 'unreadable': return { type: 'unreadable', skipped: 0, message: result.message };
  }
}
