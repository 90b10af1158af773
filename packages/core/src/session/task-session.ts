/**
 * The operations a front end needs: list, create, setCompleted, remove.
 * Each successful mutation is followed by a full rewrite of the tasks file
 * within the same call.
 */

import type { Task, TaskId } from '../types/task.js';
import type { LoadReport, MutationResult } from '../types/results.js';
import { toLoadReport } from '../types/results.js';
import { TaskStore } from '../store/task-store.js';
import { TaskService } from '../service/task-service.js';

export interface TaskStats {
  total: number;
  pending: number;
  done: number;
}

export class TaskSession {
  private readonly store: TaskStore;
  private readonly service: TaskService;
  readonly loadReport: LoadReport;

  constructor(store: TaskStore) {
    this.store = store;
    const loaded = store.load();
    this.loadReport = toLoadReport(loaded);
    this.service = new TaskService(loaded.tasks);
  }

  get filePath(): string {
    return this.store.filePath;
  }

  list(): readonly Task[] {
    return this.service.all();
  }

  /** Rejects blank titles before anything reaches the collection */
  create(title: string, description: string = ''): MutationResult<Task> {
    if (title.trim() === '') return { type: 'error', message: 'Title is required' };
    const task = this.service.add(title, description);
    return { type: 'success', data: task, warnings: this.flush() };
  }

  setCompleted(id: TaskId, value: boolean): MutationResult<Task> {
    if (!this.service.toggle(id, value)) return { type: 'not-found', taskId: id };
    const task = this.service.find(id);
    if (!task) return { type: 'not-found', taskId: id };
    return { type: 'success', data: task, warnings: this.flush() };
  }

  remove(id: TaskId): MutationResult<Task> {
    const task = this.service.find(id);
    if (!task || !this.service.delete(id)) return { type: 'not-found', taskId: id };
    return { type: 'success', data: task, warnings: this.flush() };
  }

  /** Rewrite the file from the current order. Returns warnings, never throws. */
  flush(): string[] {
    const result = this.store.save(this.service.all());
    return result.type === 'error' ? [`Failed to save: ${result.message}`] : [];
  }

  stats(): TaskStats {
    const done = this.service.all().filter(t => t.completed).length;
    return { total: this.service.size, pending: this.service.size - done, done };
  }
}

export function openTaskSession(filePath: string): TaskSession {
  return new TaskSession(new TaskStore(filePath));
}
