// Types
export type { Task, NewTask, ListedTask, TaskResult } from './types/index.js';
export { isSuccess } from './types/index.js';

// Errors
export { ParseTaskError, TimestampError, TaskStoreError } from './errors.js';
export type { ParseTaskErrorKind, TaskStoreErrorKind } from './errors.js';

// Codec
export * from './codec/index.js';

// Store
export * from './store/index.js';

// Display
export { renderTaskTable } from './format/task-table.js';
export type { TaskTableOptions } from './format/task-table.js';

// Parsers
export * from './parsers/index.js';

// Configuration
export { resolveTaskFilePath, DEFAULT_TASK_FILE, TASK_FILE_ENV } from './config.js';
