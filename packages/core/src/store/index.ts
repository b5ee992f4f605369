export { PlainTextTaskStore, readTasks, writeTasks } from './plain-text-task-store.js';
export type { TaskTracker, ListFilter } from './task-tracker.js';
export {
  createTask, withComplete, compareDeadlines, sortByDeadline,
  locateIncomplete, isOverdue, matchesTags,
} from './task-helpers.js';
export type { TagMatch } from './task-helpers.js';
