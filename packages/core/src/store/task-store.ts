/**
 * Reads and writes the whole task collection as one flat text file.
 * Every save rewrites the file from scratch; load tolerates damaged lines.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, EOL } from 'node:os';
import type { Task } from '../types/task.js';
import type { LoadResult, SaveResult } from '../types/results.js';
import { formatRecord, parseRecord } from './record-codec.js';

const LINE_BREAK_RE = /\r\n|\r|\n/;

/** Returns the default tasks file, `~/.todo_simple/tasks.txt` */
export function getDefaultTasksPath(home: string = homedir()): string {
  return join(home, '.todo_simple', 'tasks.txt');
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TaskStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Tasks in file order. A missing or unreadable file yields no tasks.
   * A repeated id keeps its first record; later ones count as skipped.
   */
  load(): LoadResult {
    if (!existsSync(this.filePath)) return { type: 'missing', tasks: [] };

    let content: string;
    try {
      content = readFileSync(this.filePath, 'utf-8');
    } catch (err: unknown) {
      return { type: 'unreadable', tasks: [], message: errorMessage(err) };
    }

    const tasks: Task[] = [];
    const seen = new Set<number>();
    let skipped = 0;
    for (const line of content.split(LINE_BREAK_RE)) {
      if (line.trim() === '') continue;
      const task = parseRecord(line);
      if (task && !seen.has(task.id)) {
        seen.add(task.id);
        tasks.push(task);
      } else {
        skipped++;
      }
    }

    return { type: 'loaded', tasks, skipped };
  }

  /** Overwrite the file with one record per task, in the order given */
  save(tasks: readonly Task[]): SaveResult {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      const body = tasks.map(t => formatRecord(t) + EOL).join('');
      writeFileSync(this.filePath, body, 'utf-8');
      return { type: 'success' };
    } catch (err: unknown) {
      return { type: 'error', message: errorMessage(err) };
    }
  }
}
