import type { Services } from '../services.js';
import { formatTaskList } from '../../formatters/task.js';
import { toRecord } from '../../task/task.js';
import { validatePriority } from '../../utils/validation.js';

export interface ListCommandOptions {
  all?: boolean;
  category?: string;
  priority?: string;
  json?: boolean;
}

/**
 * Main implementation of the list command.
 */
export async function listCommand(options: ListCommandOptions, services: Services): Promise<void> {
  // 1. Validate filters (fail-fast)
  const priority = options.priority !== undefined ? validatePriority(options.priority) : undefined;
  const category = options.category?.trim() || undefined;
  const filters = { all: !!options.all, category, priority };

  // 2. Query the store
  const tasks = services.store.list(filters);

  // 3. Output
  if (options.json) {
    console.log(JSON.stringify(tasks.map(toRecord), null, 2));
    return;
  }
  console.log(formatTaskList(tasks, filters));
}
