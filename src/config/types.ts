import type { Priority } from '../task/types.js';

export const CONFIG_FILE_NAME = 'todo.config.yml';
export const DEFAULT_DATA_FILE = 'todos.json';

export interface TaskDefaults {
  priority: Priority;
  category: string;
}

export interface Config {
  /** Absolute path of the JSON data file */
  dataFile: string;
  /** Values used by `add` when the option is omitted */
  defaults: TaskDefaults;
}

export interface ConfigService {
  load(path?: string): Promise<Config>;
  validate(raw: unknown): Config;
  createDefault(dir?: string, dataFile?: string): Promise<{ created: boolean; message: string }>;
}
