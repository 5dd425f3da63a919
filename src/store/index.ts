export { TaskStore } from './store.js';
export type { AddTaskOptions, EditTaskOptions, ListTasksOptions, TaskStats } from './types.js';
