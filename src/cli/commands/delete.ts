import type { Services } from '../services.js';
import { TaskNotFoundError } from '../errors.js';
import { parseTaskId } from '../../utils/validation.js';

export interface DeleteCommandOptions {
  id: string;
}

export async function deleteCommand(
  options: DeleteCommandOptions,
  services: Services,
): Promise<number> {
  const id = parseTaskId(options.id);

  if (!(await services.store.delete(id))) {
    throw new TaskNotFoundError(id);
  }
  return id;
}
