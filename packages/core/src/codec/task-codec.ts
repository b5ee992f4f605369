/**
 * Single-line, pipe-delimited encoding of a task:
 *
 *   | <name> | <tag, tag> | <true|false> | <RFC 3339 deadline> |
 *
 * Empty tags and an absent deadline are written as empty fields.
 */

import type { Task } from '../types/task.js';
import { ParseTaskError, TimestampError } from '../errors.js';
import { formatTimestamp, parseTimestamp } from './timestamp.js';

const FIELD_SEPARATOR = '|';
const TAG_SEPARATOR = ', ';
const FIELD_COUNT = 4;

type TaskFields = [name: string, tags: string, complete: string, deadline: string];

function hasFieldCount(fields: string[]): fields is TaskFields {
  return fields.length === FIELD_COUNT;
}

/** Encode a task as one storage line (without line terminator) */
export function encodeTask(task: Task): string {
  const tags = task.tags?.join(TAG_SEPARATOR) ?? '';
  const deadline = task.deadline ? formatTimestamp(task.deadline) : '';
  return `| ${task.name} | ${tags} | ${task.complete} | ${deadline} |`;
}

/**
 * Decode one storage line. Strict: any malformed field rejects the line.
 *
 * @throws ParseTaskError with kind `invalid-format`, `invalid-boolean` or `invalid-timestamp`
 */
export function decodeTask(line: string): Task {
  const fields = line
    .trim()
    .replace(/^\|+|\|+$/g, '')
    .split(FIELD_SEPARATOR)
    .map(f => f.trim());

  if (!hasFieldCount(fields)) {
    throw new ParseTaskError(
      'invalid-format',
      `expected ${FIELD_COUNT} fields but found ${fields.length}`,
    );
  }

  const [name, tagsField, completeField, deadlineField] = fields;
  if (name === '') throw new ParseTaskError('invalid-format', 'task name is empty');

  return {
    name,
    tags: decodeTags(tagsField),
    complete: decodeComplete(completeField),
    deadline: decodeDeadline(deadlineField),
  };
}

function decodeTags(field: string): string[] | null {
  // A field holding only separators and whitespace counts as no tags
  if (field.split(',').every(t => t.trim() === '')) return null;
  return field.split(TAG_SEPARATOR);
}

function decodeComplete(field: string): boolean {
  switch (field) {
    case 'true': return true;
    case 'false': return false;
    default:
      throw new ParseTaskError(
        'invalid-boolean',
        `invalid completion flag '${field}', expected 'true' or 'false'`,
      );
  }
}

function decodeDeadline(field: string): Date | null {
  if (field === '') return null;
  try {
    return parseTimestamp(field);
  } catch (err: unknown) {
    if (err instanceof TimestampError) {
      throw new ParseTaskError('invalid-timestamp', `invalid deadline '${field}': ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/** Names must survive a round trip through the line format */
export function isValidTaskName(name: string): boolean {
  return name.trim() !== '' && name === name.trim() && !/[|\r\n]/.test(name);
}

/** Tags must survive a round trip through the line format */
export function isValidTag(tag: string): boolean {
  return tag.trim() !== '' && tag === tag.trim() && !/[|,\r\n]/.test(tag);
}
