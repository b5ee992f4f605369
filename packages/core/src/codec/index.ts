export { encodeTask, decodeTask, isValidTaskName, isValidTag } from './task-codec.js';
export { formatTimestamp, parseTimestamp, formatDeadline, isEncodableTimestamp } from './timestamp.js';
