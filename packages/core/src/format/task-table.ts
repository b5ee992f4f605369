/**
 * Column-aligned table for task listings. Widths are computed from the rows
 * passed in on every call.
 */

import type { ListedTask } from '../types/task.js';
import { formatDeadline } from '../codec/timestamp.js';

const MIN_ID_WIDTH = 1;
const MIN_NAME_WIDTH = 4;
const MIN_TAGS_WIDTH = 4;
const DUE_WIDTH = 19; // MM/DD/YYYY HH:MM:SS
const DONE_WIDTH = 4;
const DONE_MARK = '✓';

export interface TaskTableOptions {
  /** Show the `#` column (default true) */
  showIds?: boolean;
  /** Decorate a finished data row, e.g. with terminal colors */
  styleRow?: (line: string, row: ListedTask) => string;
}

function center(text: string, width: number): string {
  const left = Math.floor(Math.max(0, width - text.length) / 2);
  return text.padStart(text.length + left).padEnd(width);
}

function formatLine(cells: readonly string[], widths: readonly number[]): string {
  const padded = cells.map((c, i) => c.padEnd(widths[i] ?? 0));
  return `| ${padded.join(' | ')} |`;
}

function maxWidth(min: number, values: readonly string[]): number {
  return Math.max(min, ...values.map(v => v.length));
}

export function renderTaskTable(rows: readonly ListedTask[], options: TaskTableOptions = {}): string {
  const showIds = options.showIds ?? true;

  const cells = rows.map(row => ({
    row,
    id: row.id == null ? '' : String(row.id),
    name: row.task.name,
    tags: row.task.tags?.join(', ') ?? '',
    due: formatDeadline(row.task.deadline),
    done: center(row.task.complete ? DONE_MARK : '', DONE_WIDTH),
  }));

  const nameWidth = maxWidth(MIN_NAME_WIDTH, cells.map(c => c.name));
  const tagsWidth = maxWidth(MIN_TAGS_WIDTH, cells.map(c => c.tags));
  const widths = [nameWidth, tagsWidth, DUE_WIDTH, DONE_WIDTH];
  const header = ['Name', 'Tags', 'Due', 'Done'];
  if (showIds) {
    widths.unshift(maxWidth(MIN_ID_WIDTH, cells.map(c => c.id)));
    header.unshift('#');
  }

  const ruleWidth = widths.reduce((sum, w) => sum + w + 3, 1);
  const lines = [formatLine(header, widths), '='.repeat(ruleWidth)];

  for (const c of cells) {
    const values = [c.name, c.tags, c.due, c.done];
    if (showIds) values.unshift(c.id);
    const line = formatLine(values, widths);
    lines.push(options.styleRow ? options.styleRow(line, c.row) : line);
  }

  return lines.join('\n');
}
