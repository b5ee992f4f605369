import type { Task, NewTask } from '../types/task.js';

export type TagMatch = 'any' | 'all';

/** Create a new, incomplete Task. Empty tag lists are stored as null. */
export function createTask(input: NewTask): Task {
  const tags = input.tags && input.tags.length > 0 ? [...input.tags] : null;
  return {
    name: input.name,
    tags,
    complete: false,
    deadline: input.deadline ?? null,
  };
}

/** Return a copy of the task marked complete */
export function withComplete(task: Task): Task {
  return { ...task, complete: true };
}

/** Ascending deadline; tasks without a deadline sort after all others */
export function compareDeadlines(a: Task, b: Task): number {
  if (a.deadline == null) return b.deadline == null ? 0 : 1;
  if (b.deadline == null) return -1;
  return a.deadline.getTime() - b.deadline.getTime();
}

/** Stable sort by deadline (returns a new array) */
export function sortByDeadline(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareDeadlines);
}

/**
 * Find the task whose position among incomplete tasks equals `index`.
 * Returns its position in the full collection, or null when out of range.
 */
export function locateIncomplete(
  tasks: readonly Task[],
  index: number,
): { position: number; task: Task } | null {
  if (!Number.isInteger(index) || index < 0) return null;

  let seen = 0;
  for (const [position, task] of tasks.entries()) {
    if (task.complete) continue;
    if (seen === index) return { position, task };
    seen++;
  }
  return null;
}

/** Incomplete with a deadline at or before `now` */
export function isOverdue(task: Task, now: Date = new Date()): boolean {
  return !task.complete && task.deadline != null && task.deadline.getTime() <= now.getTime();
}

/**
 * `any`: the task carries at least one of the requested tags.
 * `all`: the task carries every requested tag.
 */
export function matchesTags(task: Task, tags: readonly string[], mode: TagMatch = 'any'): boolean {
  const own = new Set(task.tags ?? []);
  return mode === 'all'
    ? tags.every(t => own.has(t))
    : tags.some(t => own.has(t));
}
