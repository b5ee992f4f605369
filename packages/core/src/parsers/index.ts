export { parseDeadline, parseDay, parseTime, startOfDay, DEFAULT_TIME } from './deadline-parser.js';
export type { TimeOfDay } from './deadline-parser.js';
