/**
 * chalk-based output formatting for the todo command.
 */

import chalk from 'chalk';
import type { Task, MutationResult } from '@todo-simple/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

/** Completed titles are struck through and greyed out */
export function formatTitle(task: Task): string {
  return task.completed ? chalk.strikethrough.gray(task.title) : task.title;
}

export function formatTask(task: Task): string {
  const id = chalk.dim(`(${task.id})`);
  const description = task.description ? chalk.dim(`  ${task.description}`) : '';
  return `${formatCheckbox(task.completed)} ${id} ${formatTitle(task)}${description}`;
}

// --- Result output ---

/** Print a mutation result; `verb` is the past tense used on success */
export function printResult(result: MutationResult<Task>, verb: string): void {
  switch (result.type) {
    case 'success':
      success(`${verb} task (${result.data.id}): ${result.data.title}`);
      for (const w of result.warnings) warning(w);
      break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'error': error(result.message); break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
