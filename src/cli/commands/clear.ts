import type { Services } from '../services.js';

/**
 * Removes completed tasks.
 * @returns Number of removed tasks
 */
export async function clearCommand(services: Services): Promise<number> {
  return services.store.clearCompleted();
}
