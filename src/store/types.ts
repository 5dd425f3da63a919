import type { Priority } from '../task/types.js';

export interface AddTaskOptions {
  priority?: string;
  dueDate?: string | null;
  category?: string;
}

export interface ListTasksOptions {
  /** Include completed tasks */
  all?: boolean;
  category?: string;
  priority?: string;
}

/**
 * Fields to change on an existing task.
 *
 * Empty `title`, `priority` or `category` leave the field as it is.
 * `dueDate` is applied whenever it is not undefined: `''` or `null` clears it.
 */
export interface EditTaskOptions {
  title?: string;
  priority?: string;
  dueDate?: string | null;
  category?: string;
}

/** Counts over the whole store; the breakdowns cover pending tasks only. */
export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
  byPriority: Record<Priority, number> & Record<string, number>;
  byCategory: Record<string, number>;
}
