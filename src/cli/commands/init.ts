import type { ConfigService } from '../../config/types.js';

export interface InitCommandOptions {
  file?: string;
}

/**
 * Main implementation of the init command.
 */
export async function initCommand(
  options: InitCommandOptions,
  config: ConfigService,
): Promise<string> {
  const result = await config.createDefault(undefined, options.file || undefined);
  return result.message;
}
