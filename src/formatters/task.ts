import type { Task } from '../task/types.js';
import type { ListTasksOptions, TaskStats } from '../store/types.js';

const PRIORITY_EMOJI: Readonly<Record<string, string>> = {
  high: '🔴',
  medium: '🟡',
  low: '🟢',
};

const UNKNOWN_PRIORITY_EMOJI = '⚪';
const RULE = '='.repeat(50);

export function priorityEmoji(priority: string): string {
  return Object.hasOwn(PRIORITY_EMOJI, priority) ? PRIORITY_EMOJI[priority] : UNKNOWN_PRIORITY_EMOJI;
}

/**
 * One-line view of a task.
 *
 * @example
 * formatTask(task) // "○ [3] 🔴 Buy groceries (до: 2025-12-25) [shopping]"
 */
export function formatTask(task: Task): string {
  const status = task.completed ? '✓' : '○';
  const due = task.dueDate ? ` (до: ${task.dueDate})` : '';
  return `${status} [${task.id}] ${priorityEmoji(task.priority)} ${task.title}${due} [${task.category}]`;
}

/**
 * Renders the result of `list`, or a "nothing found" line naming the active filters.
 */
export function formatTaskList(tasks: readonly Task[], options: ListTasksOptions = {}): string {
  if (tasks.length === 0) {
    const filters: string[] = [];
    if (options.category) filters.push(`category='${options.category}'`);
    if (options.priority) filters.push(`priority='${options.priority}'`);
    const suffix = filters.length > 0 ? ` (${filters.join(', ')})` : '';
    return `Нет задач${suffix}`;
  }

  const title = options.all ? 'СПИСОК ЗАДАЧ (включая выполненные)' : 'СПИСОК ЗАДАЧ';
  return [RULE, title, RULE, ...tasks.map(formatTask), RULE, `Показано задач: ${tasks.length}`].join(
    '\n',
  );
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatStats(stats: TaskStats): string {
  const lines = [
    '='.repeat(40),
    'СТАТИСТИКА',
    '='.repeat(40),
    `Всего:          ${stats.total}`,
    `Выполнено:      ${stats.completed}`,
    `В работе:       ${stats.pending}`,
    '',
    'По приоритету (в работе):',
  ];

  for (const [priority, count] of Object.entries(stats.byPriority)) {
    lines.push(`${priorityEmoji(priority)} ${capitalize(priority)}: ${count}`);
  }

  const categories = Object.keys(stats.byCategory).sort();
  if (categories.length > 0) {
    lines.push('', 'По категориям (в работе):');
    for (const category of categories) {
      lines.push(`• ${category}: ${stats.byCategory[category]}`);
    }
  }

  lines.push('='.repeat(40));
  return lines.join('\n');
}
