import type { Services } from '../services.js';
import type { EditTaskOptions } from '../../store/types.js';
import { TaskNotFoundError } from '../errors.js';
import { parseTaskId, validateDueDate, validatePriority } from '../../utils/validation.js';

export interface EditCommandOptions {
  id: string;
  title?: string;
  priority?: string;
  due?: string;
  category?: string;
}

/**
 * Main implementation of the edit command.
 *
 * Empty --title, --priority or --category keep the current value,
 * while `--due ""` removes the due date.
 */
export async function editCommand(options: EditCommandOptions, services: Services): Promise<number> {
  // 1. Validate ID and options (fail-fast)
  const id = parseTaskId(options.id);

  const changes: EditTaskOptions = {
    title: options.title?.trim(),
    category: options.category?.trim(),
  };
  if (options.priority) {
    changes.priority = validatePriority(options.priority);
  }
  if (options.due !== undefined) {
    changes.dueDate = options.due.trim() === '' ? null : validateDueDate(options.due);
  }

  // 2. Apply
  if (!(await services.store.edit(id, changes))) {
    throw new TaskNotFoundError(id);
  }
  return id;
}
