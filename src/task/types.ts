/** Priorities the CLI accepts. Stored records may carry any lowercase string. */
export const PRIORITIES = ['high', 'medium', 'low'] as const;

export type Priority = (typeof PRIORITIES)[number];

export const DEFAULT_PRIORITY: Priority = 'medium';
export const DEFAULT_CATEGORY = 'general';

export interface Task {
  id: number;
  title: string;
  /** Lowercase. Not restricted to {@link Priority} at this layer. */
  priority: string;
  /** ISO date (YYYY-MM-DD) or null when the task has no due date */
  dueDate: string | null;
  /** Lowercase */
  category: string;
  completed: boolean;
  /** ISO timestamp, set once at creation */
  readonly createdAt: string;
}

/**
 * Shape of one task in the data file.
 * Key names are snake_case so existing data files stay readable.
 */
export interface TaskRecord {
  id: number;
  title: string;
  priority: string;
  due_date: string | null;
  category: string;
  completed: boolean;
  created_at: string;
}

export interface TaskInit {
  id: number;
  title: string;
  priority?: string;
  dueDate?: string | null;
  category?: string;
  completed?: boolean;
  createdAt?: string;
}
