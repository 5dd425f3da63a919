import { resolve } from 'node:path';
import type { Config, ConfigService } from '../config/types.js';
import { configService } from '../config/index.js';
import { createStorageService } from '../storage/storage.js';
import { TaskStore } from '../store/store.js';

export type GlobalOptions = {
  /** Path to todo.config.yml */
  config?: string;
  /** Data file, overrides `dataFile` from the config */
  file?: string;
};

export interface Services {
  config: Config;
  store: TaskStore;
}

export async function createServices(
  options: GlobalOptions = {},
  configs: ConfigService = configService,
): Promise<Services> {
  // 1. Load config first (needed for dataFile)
  const loaded = await configs.load(options.config);
  const config: Config = options.file ? { ...loaded, dataFile: resolve(options.file) } : loaded;

  // 2. Open the store on the configured data file
  const store = await TaskStore.open(createStorageService(config.dataFile));

  return { config, store };
}
