import type { Task, NewTask, ListedTask } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import type { TagMatch } from './task-helpers.js';

export interface ListFilter {
  /** Include completed tasks (ids are not shown in that case) */
  all?: boolean;
  /** Only incomplete tasks whose deadline has passed */
  overdue?: boolean;
  /** Only tasks carrying the given tags; empty or null disables the filter */
  tags?: readonly string[] | null;
  tagMatch?: TagMatch;
  /** Keep at most this many rows, i.e. the next n due */
  limit?: number;
  /** Reference time for the overdue filter */
  now?: Date;
}

/**
 * Storage-independent task tracker. Ids taken by `complete` and `delete` are
 * positions among incomplete tasks in deadline order, as shown by `list`.
 */
export interface TaskTracker {
  load(): Task[];
  add(input: NewTask): Task;
  complete(index: number): TaskResult;
  delete(index: number): TaskResult;
  query(filter?: ListFilter): ListedTask[];
  list(filter?: ListFilter): string;
}
