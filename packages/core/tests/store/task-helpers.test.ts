import { describe, it, expect } from 'vitest';
import {
  createTask, withComplete, sortByDeadline, locateIncomplete, isOverdue, matchesTags,
} from '../../src/store/task-helpers.js';
import type { Task } from '../../src/types/task.js';

function task(name: string, overrides: Partial<Task> = {}): Task {
  return { name, tags: null, complete: false, deadline: null, ...overrides };
}

describe('createTask', () => {
  it('starts incomplete and copies tags', () => {
    const tags = ['a'];
    const created = createTask({ name: 'New', tags });
    expect(created).toEqual({ name: 'New', tags: ['a'], complete: false, deadline: null });
    expect(created.tags).not.toBe(tags);
  });
});

describe('withComplete', () => {
  it('returns a completed copy', () => {
    const original = task('x');
    expect(withComplete(original).complete).toBe(true);
    expect(original.complete).toBe(false);
  });
});

describe('sortByDeadline', () => {
  it('does not reorder the input array', () => {
    const input = [task('b', { deadline: new Date(2) }), task('a', { deadline: new Date(1) })];
    const sorted = sortByDeadline(input);
    expect(sorted.map(t => t.name)).toEqual(['a', 'b']);
    expect(input.map(t => t.name)).toEqual(['b', 'a']);
  });
});

describe('locateIncomplete', () => {
  const tasks = [task('done', { complete: true }), task('first'), task('second')];

  it('counts only incomplete tasks', () => {
    expect(locateIncomplete(tasks, 1)).toEqual({ position: 2, task: tasks[2] });
  });

  it('returns null for out-of-range or non-integer indexes', () => {
    expect(locateIncomplete(tasks, 2)).toBeNull();
    expect(locateIncomplete(tasks, -1)).toBeNull();
    expect(locateIncomplete(tasks, 0.5)).toBeNull();
  });
});

describe('isOverdue', () => {
  const now = new Date('2025-03-18T00:00:00Z');

  it('is true at or after the deadline', () => {
    expect(isOverdue(task('x', { deadline: now }), now)).toBe(true);
    expect(isOverdue(task('x', { deadline: new Date('2025-03-19T00:00:00Z') }), now)).toBe(false);
  });

  it('is never true for completed tasks or tasks without a deadline', () => {
    expect(isOverdue(task('x', { complete: true, deadline: new Date(0) }), now)).toBe(false);
    expect(isOverdue(task('x'), now)).toBe(false);
  });
});

describe('matchesTags', () => {
  const tagged = task('x', { tags: ['home', 'money'] });

  it('matches on any shared tag by default', () => {
    expect(matchesTags(tagged, ['money', 'work'])).toBe(true);
    expect(matchesTags(tagged, ['work'])).toBe(false);
  });

  it('requires every tag in all mode', () => {
    expect(matchesTags(tagged, ['money', 'work'], 'all')).toBe(false);
    expect(matchesTags(tagged, ['home', 'money'], 'all')).toBe(true);
  });

  it('never matches an untagged task', () => {
    expect(matchesTags(task('x'), ['home'])).toBe(false);
  });
});
