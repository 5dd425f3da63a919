export * from './task/index.js';
export * from './store/index.js';
export * from './storage/index.js';
export { configService, ConfigServiceImpl } from './config/index.js';
export type { Config, ConfigService, TaskDefaults } from './config/types.js';
export { sortTasks, priorityRank } from './utils/sort.js';
