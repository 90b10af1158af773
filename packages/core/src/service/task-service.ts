/**
 * Owns the live task collection: assigns ids and keeps the display order.
 *
 * Order is incomplete before completed, then newest (highest id) first.
 * It is recomputed after every mutation rather than stored.
 */

import type { Task, TaskId } from '../types/task.js';

export function compareTasks(a: Task, b: Task): number {
  if (a.completed !== b.completed) return a.completed ? 1 : -1;
  return b.id - a.id;
}

function freezeTask(task: Task): Task {
  return Object.freeze({
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
  });
}

export class TaskService {
  private tasks: Task[] = [];
  private nextId: TaskId;

  constructor(initial: readonly Task[] = []) {
    const seen = new Set<TaskId>();
    for (const task of initial) {
      // first occurrence wins when a file repeats an id
      if (seen.has(task.id)) continue;
      seen.add(task.id);
      this.tasks.push(freezeTask(task));
    }
    this.nextId = this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
    this.sort();
  }

  get size(): number {
    return this.tasks.length;
  }

  /** Snapshot of the current order */
  all(): readonly Task[] {
    return Object.freeze([...this.tasks]);
  }

  find(id: TaskId): Task | null {
    return this.tasks.find(t => t.id === id) ?? null;
  }

  /** Title is not validated here; callers reject blank titles. */
  add(title: string, description: string = ''): Task {
    const task = freezeTask({
      id: this.nextId++,
      title: title.trim(),
      description: description.trim(),
      completed: false,
    });
    this.tasks.push(task);
    this.sort();
    return task;
  }

  toggle(id: TaskId, value: boolean): boolean {
    const index = this.tasks.findIndex(t => t.id === id);
    const current = this.tasks[index];
    if (!current) return false;
    this.tasks[index] = freezeTask({ ...current, completed: value });
    this.sort();
    return true;
  }

  delete(id: TaskId): boolean {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter(t => t.id !== id);
    const removed = this.tasks.length !== before;
    if (removed) this.sort();
    return removed;
  }

  private sort(): void {
    this.tasks.sort(compareTasks);
  }
}
