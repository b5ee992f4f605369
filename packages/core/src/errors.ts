/**
 * Typed errors raised by the codec and the store.
 */

export type ParseTaskErrorKind = 'invalid-format' | 'invalid-boolean' | 'invalid-timestamp';

/** A stored line could not be decoded. `kind` names the failing stage. */
export class ParseTaskError extends Error {
  readonly kind: ParseTaskErrorKind;

  constructor(kind: ParseTaskErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ParseTaskError';
    this.kind = kind;
  }
}

/** A timestamp string is not valid RFC 3339. */
export class TimestampError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimestampError';
  }
}

export type TaskStoreErrorKind = 'io' | 'invalid-task' | 'invalid-deadline';

/**
 * Failure of a store operation. I/O failures and decode failures share this
 * type so callers handle a single error; the original error is kept as `cause`.
 */
export class TaskStoreError extends Error {
  readonly kind: TaskStoreErrorKind;
  readonly line: number | null;

  private constructor(kind: TaskStoreErrorKind, message: string, line: number | null, cause: unknown) {
    super(message, { cause });
    this.name = 'TaskStoreError';
    this.kind = kind;
    this.line = line;
  }

  static io(cause: unknown): TaskStoreError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new TaskStoreError('io', message, null, cause);
  }

  static invalidTask(line: number, cause: ParseTaskError): TaskStoreError {
    return new TaskStoreError('invalid-task', `Invalid task on line ${line}: ${cause.message}`, line, cause);
  }

  /** The deadline of a new task has no four-digit-year timestamp */
  static invalidDeadline(deadline: Date): TaskStoreError {
    return new TaskStoreError(
      'invalid-deadline',
      'Deadline cannot be stored: it must fall between the years 0000 and 9999',
      null,
      deadline,
    );
  }
}
