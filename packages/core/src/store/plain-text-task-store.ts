/**
 * Task tracker backed by a flat text file, one encoded task per line.
 *
 * The file is the only source of truth: every operation reads it again.
 * `add` appends a single line; `complete` and `delete` rewrite the whole file
 * in deadline order, and only when they actually change a task.
 */

import {
  appendFileSync, closeSync, existsSync, openSync, readFileSync, readSync, statSync, writeFileSync,
} from 'node:fs';
import type { Task, NewTask, ListedTask } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import { ParseTaskError, TaskStoreError } from '../errors.js';
import { decodeTask, encodeTask } from '../codec/task-codec.js';
import { isEncodableTimestamp } from '../codec/timestamp.js';
import { renderTaskTable } from '../format/task-table.js';
import type { ListFilter, TaskTracker } from './task-tracker.js';
import {
  createTask, withComplete, sortByDeadline, locateIncomplete, isOverdue, matchesTags,
} from './task-helpers.js';

const LINE_BREAK = '\n';

/**
 * Decode the contents of a task file. Blank lines are skipped; the first bad
 * line fails the whole read.
 *
 * @throws TaskStoreError of kind `invalid-task`
 */
export function readTasks(content: string): Task[] {
  const tasks: Task[] = [];
  for (const [i, line] of content.split(/\r?\n/).entries()) {
    if (line.trim() === '') continue;
    try {
      tasks.push(decodeTask(line));
    } catch (err: unknown) {
      if (err instanceof ParseTaskError) throw TaskStoreError.invalidTask(i + 1, err);
      throw err;
    }
  }
  return sortByDeadline(tasks);
}

/** Encode tasks as file contents, each line terminated */
export function writeTasks(tasks: readonly Task[]): string {
  return tasks.map(t => encodeTask(t) + LINE_BREAK).join('');
}

export class PlainTextTaskStore implements TaskTracker {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** Read every task, sorted by deadline. Creates an empty file on first use. */
  load(): Task[] {
    const content = this.io(() => {
      writeFileSync(this.filePath, '', { flag: 'a' });
      return readFileSync(this.filePath, 'utf8');
    });
    return readTasks(content);
  }

  /** @throws TaskStoreError of kind `invalid-deadline` when the deadline cannot be written */
  add(input: NewTask): Task {
    if (input.deadline && !isEncodableTimestamp(input.deadline)) {
      throw TaskStoreError.invalidDeadline(input.deadline);
    }
    const task = createTask(input);
    const line = encodeTask(task) + LINE_BREAK;
    this.io(() => {
      const prefix = this.endsMidLine() ? LINE_BREAK : '';
      appendFileSync(this.filePath, prefix + line, 'utf8');
    });
    return task;
  }

  complete(index: number): TaskResult {
    const tasks = this.load();
    const found = locateIncomplete(tasks, index);
    if (!found) return { type: 'no-change', message: `No incomplete task with id ${index}` };

    this.save(tasks.map((t, i) => (i === found.position ? withComplete(t) : t)));
    return { type: 'success', message: `Completed '${found.task.name}'` };
  }

  delete(index: number): TaskResult {
    const tasks = this.load();
    const found = locateIncomplete(tasks, index);
    if (!found) return { type: 'no-change', message: `No incomplete task with id ${index}` };

    this.save(tasks.filter((_, i) => i !== found.position));
    return { type: 'success', message: `Deleted '${found.task.name}'` };
  }

  /**
   * Load and filter tasks for display. Ids are numbered before the overdue,
   * tag and limit filters apply, so they stay usable with complete/delete.
   */
  query(filter: ListFilter = {}): ListedTask[] {
    const tasks = this.load();
    const now = filter.now ?? new Date();

    let rows: ListedTask[] = filter.all
      ? tasks.map(task => ({ id: null, task }))
      : tasks.filter(t => !t.complete).map((task, id) => ({ id, task }));

    if (filter.overdue) {
      rows = rows.filter(r => isOverdue(r.task, now));
    }
    const tags = filter.tags;
    if (tags && tags.length > 0) {
      rows = rows.filter(r => matchesTags(r.task, tags, filter.tagMatch));
    }
    if (filter.limit != null) {
      rows = rows.slice(0, Math.max(0, filter.limit));
    }
    return rows;
  }

  list(filter: ListFilter = {}): string {
    return renderTaskTable(this.query(filter), { showIds: !filter.all });
  }

  private save(tasks: readonly Task[]): void {
    this.io(() => writeFileSync(this.filePath, writeTasks(tasks), 'utf8'));
  }

  /** True when the file has content whose last byte is not a line feed */
  private endsMidLine(): boolean {
    if (!existsSync(this.filePath)) return false;
    const size = statSync(this.filePath).size;
    if (size === 0) return false;

    const fd = openSync(this.filePath, 'r');
    try {
      const last = Buffer.alloc(1);
      readSync(fd, last, 0, 1, size - 1);
      return last[0] !== 0x0a;
    } finally {
      closeSync(fd);
    }
  }

  private io<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      throw TaskStoreError.io(err);
    }
  }
}
