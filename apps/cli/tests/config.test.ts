import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { getDefaultTasksPath } from '@todo-simple/core';
import { resolveTasksPath, TASKS_FILE_ENV } from '../src/config.js';

describe('resolveTasksPath', () => {
  it('prefers the explicit path', () => {
    expect(resolveTasksPath('/tmp/a.txt', { [TASKS_FILE_ENV]: '/tmp/b.txt' })).toBe('/tmp/a.txt');
  });

  it('uses the environment variable next', () => {
    expect(resolveTasksPath(undefined, { [TASKS_FILE_ENV]: '/tmp/b.txt' })).toBe('/tmp/b.txt');
  });

  it('resolves relative paths against the working directory', () => {
    expect(resolveTasksPath('tasks.txt', {})).toBe(resolve('tasks.txt'));
  });

  it('falls back to the default location', () => {
    expect(resolveTasksPath(undefined, {})).toBe(getDefaultTasksPath());
  });

  it('ignores an empty environment variable', () => {
    expect(resolveTasksPath(undefined, { [TASKS_FILE_ENV]: '' })).toBe(getDefaultTasksPath());
  });
});
