import type { Services } from '../services.js';
import { TaskNotFoundError } from '../errors.js';
import { parseTaskId } from '../../utils/validation.js';

export interface DoneCommandOptions {
  id: string;
}

/**
 * Marks a task as completed.
 * @returns Numeric id of the task
 */
export async function doneCommand(options: DoneCommandOptions, services: Services): Promise<number> {
  const id = parseTaskId(options.id);

  if (!(await services.store.complete(id))) {
    throw new TaskNotFoundError(id);
  }
  return id;
}

/**
 * Returns a completed task to pending.
 */
export async function undoCommand(options: DoneCommandOptions, services: Services): Promise<number> {
  const id = parseTaskId(options.id);

  if (!(await services.store.uncomplete(id))) {
    throw new TaskNotFoundError(id);
  }
  return id;
}
