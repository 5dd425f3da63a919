import { readFile, access, writeFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { DEFAULT_CATEGORY, DEFAULT_PRIORITY, PRIORITIES } from '../task/types.js';
import { CONFIG_FILE_NAME, DEFAULT_DATA_FILE, type Config, type ConfigService } from './types.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';

const CATEGORY_REGEX = /^\S(.*\S)?$/;

const defaultsSchema = z
  .object({
    priority: z.enum(PRIORITIES).default(DEFAULT_PRIORITY),
    category: z
      .string()
      .regex(CATEGORY_REGEX, 'Category cannot be empty or surrounded by whitespace')
      .transform((category) => category.toLowerCase())
      .default(DEFAULT_CATEGORY),
  })
  .strict();

const configSchema = z
  .object({
    dataFile: z.string().min(1, 'dataFile cannot be empty').default(DEFAULT_DATA_FILE),
    defaults: defaultsSchema.default({}),
  })
  .strict();

function isErrnoError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

export class ConfigServiceImpl implements ConfigService {
  constructor(private readonly cwd: () => string = () => process.cwd()) {}

  async createDefault(
    dir: string = this.cwd(),
    dataFile: string = `./${DEFAULT_DATA_FILE}`,
  ): Promise<{ created: boolean; message: string }> {
    const configPath = resolve(dir, CONFIG_FILE_NAME);

    // Check if config already exists
    try {
      await access(configPath);
      return { created: false, message: `Конфигурация уже существует (${CONFIG_FILE_NAME})` };
    } catch {
      // File doesn't exist, continue
    }

    const defaultConfig = {
      dataFile,
      defaults: {
        priority: DEFAULT_PRIORITY,
        category: DEFAULT_CATEGORY,
      },
    };

    await writeFile(configPath, stringify(defaultConfig), 'utf-8');

    return { created: true, message: `Создан ${configPath}` };
  }

  /**
   * Find config file by traversing up the directory tree.
   * Returns the resolved path to the config file, or null if not found.
   */
  private async findConfigPath(startDir: string): Promise<string | null> {
    let currentDir = resolve(startDir);

    while (true) {
      const configPath = resolve(currentDir, CONFIG_FILE_NAME);

      try {
        await access(configPath);
        return configPath;
      } catch (e) {
        // If it's not a "not found" error (e.g., permission denied), propagate it
        if (!isErrnoError(e) || e.code !== 'ENOENT') {
          throw new ConfigLoadError(
            `Cannot access config at ${configPath}`,
            e instanceof Error ? e : undefined,
          );
        }
      }

      const parentDir = dirname(currentDir);

      // Stop if we've reached the root
      if (parentDir === currentDir) {
        return null;
      }

      currentDir = parentDir;
    }
  }

  /**
   * Loads the configuration.
   *
   * With an explicit path the file must exist. Otherwise the nearest
   * todo.config.yml above the working directory is used, falling back to
   * built-in defaults. `dataFile` is resolved relative to the config file.
   */
  async load(path?: string): Promise<Config> {
    let configPath: string;

    if (path) {
      configPath = resolve(path);
      try {
        await access(configPath);
      } catch {
        throw new ConfigNotFoundError(configPath);
      }
    } else {
      const foundPath = await this.findConfigPath(this.cwd());
      if (!foundPath) {
        return this.resolveDataFile(this.validate({}), this.cwd());
      }
      configPath = foundPath;
    }

    const content = await readFile(configPath, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = parse(content);
    } catch (e) {
      throw new ConfigLoadError(
        'Invalid YAML in configuration file',
        e instanceof Error ? e : undefined,
      );
    }

    // Empty file parses to null
    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }

    if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
      throw new ConfigLoadError('Configuration file must contain a mapping');
    }

    return this.resolveDataFile(this.validate(rawConfig), dirname(configPath));
  }

  /**
   * Checks a raw config object against the schema and fills defaults.
   * `dataFile` is returned as written, not resolved.
   */
  validate(raw: unknown): Config {
    const result = configSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }

    return result.data;
  }

  private resolveDataFile(config: Config, baseDir: string): Config {
    return {
      ...config,
      dataFile: resolve(baseDir, config.dataFile),
    };
  }
}

export const configService = new ConfigServiceImpl();
