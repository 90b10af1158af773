import { describe, it, expect, beforeEach } from 'vitest';
import { TaskService, compareTasks } from '../../src/service/task-service.js';
import type { Task } from '../../src/types/task.js';

function summary(service: TaskService): Array<[number, boolean]> {
  return service.all().map(t => [t.id, t.completed]);
}

function assertOrdered(tasks: readonly Task[]): void {
  for (let i = 1; i < tasks.length; i++) {
    expect(compareTasks(tasks[i - 1]!, tasks[i]!)).toBeLessThan(0);
  }
}

let service: TaskService;

beforeEach(() => {
  service = new TaskService();
});

describe('construction', () => {
  it('sorts the initial tasks', () => {
    service = new TaskService([
      { id: 1, title: 'a', description: '', completed: true },
      { id: 2, title: 'b', description: '', completed: false },
      { id: 5, title: 'c', description: '', completed: true },
      { id: 3, title: 'd', description: '', completed: false },
    ]);
    expect(summary(service)).toEqual([[3, false], [2, false], [5, true], [1, true]]);
  });

  it('continues numbering after the highest loaded id', () => {
    service = new TaskService([
      { id: 4, title: 'a', description: '', completed: false },
      { id: 17, title: 'b', description: '', completed: true },
    ]);
    expect(service.add('next').id).toBe(18);
  });

  it('starts at 1 when empty', () => {
    expect(service.add('first').id).toBe(1);
  });

  it('starts at 1 when every loaded id is below 1', () => {
    service = new TaskService([{ id: -3, title: 'odd', description: '', completed: false }]);
    expect(service.add('next').id).toBe(1);
  });

  it('keeps the first task when an id repeats', () => {
    service = new TaskService([
      { id: 2, title: 'kept', description: '', completed: false },
      { id: 2, title: 'dropped', description: '', completed: true },
    ]);
    expect(service.all()).toEqual([{ id: 2, title: 'kept', description: '', completed: false }]);
  });

  it('does not share task objects with the caller', () => {
    const initial: Task[] = [{ id: 1, title: 'a', description: '', completed: false }];
    service = new TaskService(initial);
    expect(service.all()[0]).not.toBe(initial[0]);
  });
});

describe('all', () => {
  it('returns a frozen snapshot of frozen tasks', () => {
    service.add('a');
    const snapshot = service.all();
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it('is not affected by later mutations', () => {
    service.add('a');
    const snapshot = service.all();
    service.add('b');
    expect(snapshot).toHaveLength(1);
    expect(service.all()).toHaveLength(2);
  });
});

describe('add', () => {
  it('trims title and description and starts incomplete', () => {
    expect(service.add('  Buy milk  ', '  2 litres ')).toEqual({
      id: 1, title: 'Buy milk', description: '2 litres', completed: false,
    });
  });

  it('defaults the description to empty', () => {
    expect(service.add('x').description).toBe('');
  });

  it('puts the new task at the front', () => {
    service.add('a');
    service.add('b');
    service.toggle(2, true);
    const task = service.add('c');
    expect(service.all()[0]).toBe(task);
  });

  it('stores an empty title when asked to', () => {
    expect(service.add('   ').title).toBe('');
  });

  it('never reuses ids, including deleted ones', () => {
    const ids = new Set<number>();
    for (let i = 0; i < 5; i++) ids.add(service.add(`t${i}`).id);
    service.delete(5);
    service.delete(3);
    ids.add(service.add('after delete').id);
    expect(ids.size).toBe(6);
    expect(service.find(6)?.title).toBe('after delete');
  });
});

describe('toggle', () => {
  it('moves a completed task behind incomplete ones', () => {
    service.add('Buy milk', '');
    service.add('Call mom', 'reminder');
    expect(service.all().map(t => t.title)).toEqual(['Call mom', 'Buy milk']);

    expect(service.toggle(2, true)).toBe(true);
    expect(summary(service)).toEqual([[1, false], [2, true]]);
  });

  it('returns true each time the same value is set', () => {
    service.add('a');
    expect(service.toggle(1, true)).toBe(true);
    expect(service.toggle(1, true)).toBe(true);
    expect(service.find(1)?.completed).toBe(true);
  });

  it('uncompletes a task', () => {
    service.add('a');
    service.toggle(1, true);
    service.toggle(1, false);
    expect(service.find(1)?.completed).toBe(false);
  });

  it('returns false for an unknown id and changes nothing', () => {
    service.add('a');
    const before = service.all();
    expect(service.toggle(42, true)).toBe(false);
    expect(service.all()).toEqual(before);
  });

  it('replaces the task rather than mutating the snapshot', () => {
    service.add('a');
    const before = service.find(1);
    service.toggle(1, true);
    expect(before?.completed).toBe(false);
  });
});

describe('delete', () => {
  it('removes the task and reports it', () => {
    service.add('a');
    service.add('b');
    expect(service.delete(1)).toBe(true);
    expect(summary(service)).toEqual([[2, false]]);
    expect(service.size).toBe(1);
  });

  it('returns false for an unknown id and keeps the order', () => {
    service.add('a');
    service.add('b');
    service.toggle(2, true);
    const before = summary(service);
    expect(service.delete(9999)).toBe(false);
    expect(summary(service)).toEqual(before);
  });
});

describe('ordering invariant', () => {
  it('holds after a mixed sequence of operations', () => {
    for (let i = 0; i < 8; i++) service.add(`task ${i}`);
    service.toggle(3, true);
    service.toggle(7, true);
    service.delete(5);
    service.toggle(1, true);
    service.add('late');
    service.toggle(7, false);
    service.delete(2);

    expect(summary(service)).toEqual([
      [9, false], [8, false], [7, false], [6, false], [4, false],
      [3, true], [1, true],
    ]);
    assertOrdered(service.all());
  });
});

describe('scenario', () => {
  it('adds two tasks then completes the first', () => {
    service.add('Buy milk', '');
    service.add('Call mom', 'reminder');
    expect(service.all()).toEqual([
      { id: 2, title: 'Call mom', description: 'reminder', completed: false },
      { id: 1, title: 'Buy milk', description: '', completed: false },
    ]);

    service.toggle(1, true);
    expect(service.all()).toEqual([
      { id: 2, title: 'Call mom', description: 'reminder', completed: false },
      { id: 1, title: 'Buy milk', description: '', completed: true },
    ]);
  });
});
