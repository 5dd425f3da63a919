import type { Task } from '../task/types.js';

/**
 * Rank of each known priority. Anything else ranks after all of them.
 */
export const PRIORITY_ORDER: Readonly<Record<string, number>> = {
  high: 0,
  medium: 1,
  low: 2,
};

const UNKNOWN_PRIORITY_RANK = 3;

/** Stands in for a missing due date so undated tasks sort last. */
const NO_DUE_DATE = '9999-99-99';

export function priorityRank(priority: string): number {
  return Object.hasOwn(PRIORITY_ORDER, priority) ? PRIORITY_ORDER[priority] : UNKNOWN_PRIORITY_RANK;
}

export function compareTasks(a: Task, b: Task): number {
  const byPriority = priorityRank(a.priority) - priorityRank(b.priority);
  if (byPriority !== 0) return byPriority;

  const dueA = a.dueDate || NO_DUE_DATE;
  const dueB = b.dueDate || NO_DUE_DATE;
  if (dueA < dueB) return -1;
  if (dueA > dueB) return 1;
  return 0;
}

/**
 * Сортирует задачи по приоритету, затем по сроку.
 * Задачи без срока идут последними, равные сохраняют исходный порядок.
 *
 * @example
 * sortTasks([low, highDueMarch, highDueJanuary]) // [highDueJanuary, highDueMarch, low]
 *
 * @returns Новый массив; входной не изменяется
 */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}
