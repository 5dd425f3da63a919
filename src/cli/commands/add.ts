import type { Services } from '../services.js';
import type { Task } from '../../task/types.js';
import { CliValidationError } from '../errors.js';
import { validateDueDate, validatePriority } from '../../utils/validation.js';

export interface AddCommandOptions {
  title: string;
  priority?: string;
  due?: string;
  category?: string;
}

/**
 * Main implementation of the add command.
 * Omitted priority and category fall back to the config defaults.
 */
export async function addCommand(options: AddCommandOptions, services: Services): Promise<Task> {
  const title = options.title.trim();
  if (title === '') {
    throw new CliValidationError('Название задачи не может быть пустым');
  }

  const { defaults } = services.config;
  const priority =
    options.priority !== undefined ? validatePriority(options.priority) : defaults.priority;
  const dueDate = options.due ? validateDueDate(options.due) : null;
  const category = options.category?.trim() || defaults.category;

  return services.store.add(title, { priority, dueDate, category });
}
