export type { Task, NewTask, ListedTask } from './task.js';
export type { TaskResult } from './results.js';
export { isSuccess } from './results.js';
