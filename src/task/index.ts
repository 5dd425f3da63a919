export { TaskRecordError } from './errors.js';
export { createTask, fromRecord, toRecord } from './task.js';
export {
  DEFAULT_CATEGORY,
  DEFAULT_PRIORITY,
  PRIORITIES,
  type Priority,
  type Task,
  type TaskInit,
  type TaskRecord,
} from './types.js';
