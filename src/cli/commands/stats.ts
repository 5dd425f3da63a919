import type { Services } from '../services.js';
import { formatStats } from '../../formatters/task.js';

export interface StatsCommandOptions {
  json?: boolean;
}

export async function statsCommand(options: StatsCommandOptions, services: Services): Promise<void> {
  const stats = services.store.stats();

  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  console.log(formatStats(stats));
}
