/**
 * One task per line: id, completed flag, title, description, tab separated.
 */

import type { Task } from '../types/task.js';

export const FIELD_SEPARATOR = '\t';
const MIN_FIELDS = 4;
const UNSAFE_CHARS_RE = /[\t\r\n]/g;
const INTEGER_RE = /^[+-]?\d+$/;

/** Replace tabs and line breaks with a single space each */
export function sanitizeField(value: string | null | undefined): string {
  if (value == null) return '';
  return value.replace(UNSAFE_CHARS_RE, ' ');
}

export function formatRecord(task: Task): string {
  return [
    String(task.id),
    task.completed ? '1' : '0',
    sanitizeField(task.title),
    sanitizeField(task.description),
  ].join(FIELD_SEPARATOR);
}

/** Returns null for a line that cannot be read as a task */
export function parseRecord(line: string): Task | null {
  const parts = line.split(FIELD_SEPARATOR);
  if (parts.length < MIN_FIELDS) return null;

  const [rawId, rawCompleted, title, description] = parts;
  if (rawId === undefined || !INTEGER_RE.test(rawId)) return null;
  const id = Number(rawId);
  // the id counter must stay able to step past every stored id
  if (!Number.isSafeInteger(id) || id >= Number.MAX_SAFE_INTEGER) return null;

  return {
    id,
    completed: rawCompleted === '1',
    title: title ?? '',
    description: description ?? '',
  };
}
