import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageAccessError, StorageParseError, StorageWriteError } from './errors.js';

type FsModule = typeof defaultFs;

interface NodeError extends Error {
  code?: string;
  cause?: unknown;
}

function isNodeError(e: unknown): e is NodeError {
  return e instanceof Error;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Reads and writes the whole data file at once.
 */
export interface StorageService {
  /**
   * Reads every stored record.
   * @returns Parsed array, or null when the file does not exist
   * @throws {StorageParseError} when the file is not a JSON array
   * @throws {StorageAccessError} on other read failures
   */
  read(): Promise<unknown[] | null>;

  /**
   * Replaces the file contents with the given records.
   * @throws {StorageAccessError} when the file or its directory is not writable
   * @throws {StorageWriteError} on other write failures
   */
  write(records: unknown[]): Promise<void>;

  readonly filePath: string;
}

function mapWriteError(e: unknown, filePath: string): never {
  if (isNodeError(e)) {
    switch (e.code) {
      case 'EACCES':
        throw new StorageAccessError(`Нет прав доступа: ${filePath}`, e);
      case 'EISDIR':
        throw new StorageAccessError(`Путь является директорией: ${filePath}`, e);
      case 'EROFS':
        throw new StorageAccessError(`Файловая система только для чтения: ${filePath}`, e);
      case 'ENOSPC':
        throw new StorageWriteError(`Недостаточно места на диске: ${filePath}`, e);
      default:
        throw new StorageWriteError(`Ошибка записи: ${filePath}`, e);
    }
  }
  throw new StorageWriteError(`Неизвестная ошибка: ${filePath}`, toError(e));
}

/**
 * Extracts the position from a V8 JSON SyntaxError message.
 * Formats: "... in JSON at position 42", "... at line 1 column 43"
 */
function extractPosition(message: string): string | undefined {
  const posMatch = message.match(/at position (\d+)/);
  if (posMatch) {
    return posMatch[1];
  }
  const colMatch = message.match(/at line \d+ column (\d+)/);
  return colMatch?.[1];
}

async function ensureDirectoryExists(dir: string, fs: FsModule): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (e) {
    if (isNodeError(e) && e.code === 'EEXIST') {
      return;
    }
    if (
      isNodeError(e) &&
      (e.code === 'EACCES' || e.code === 'EROFS' || e.code === 'EISDIR' || e.code === 'ENOTDIR')
    ) {
      throw new StorageAccessError(`Не удалось создать директорию: ${dir}`, e);
    }
    throw new StorageWriteError(`Не удалось создать директорию: ${dir}`, toError(e));
  }
}

export class StorageServiceImpl implements StorageService {
  constructor(
    public readonly filePath: string,
    private readonly fs: FsModule = defaultFs,
  ) {}

  async read(): Promise<unknown[] | null> {
    let content: string;
    try {
      content = await this.fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNodeError(e) && e.code === 'ENOENT') {
        return null;
      }
      if (isNodeError(e) && e.code === 'EACCES') {
        throw new StorageAccessError(`Нет прав на чтение: ${this.filePath}`, e);
      }
      throw new StorageAccessError(`Ошибка чтения: ${this.filePath}`, toError(e));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      if (e instanceof SyntaxError) {
        throw new StorageParseError(
          `Невалидный JSON в файле ${this.filePath}`,
          this.filePath,
          e.message,
          extractPosition(e.message),
          e,
        );
      }
      throw e;
    }

    if (!Array.isArray(parsed)) {
      throw new StorageParseError(
        `Файл ${this.filePath} должен содержать массив задач`,
        this.filePath,
        'JSON должен быть массивом',
      );
    }

    return parsed;
  }

  async write(records: unknown[]): Promise<void> {
    await ensureDirectoryExists(path.dirname(this.filePath), this.fs);

    const tempPath = `${this.filePath}.tmp`;

    // Cleanup старый .tmp если есть
    try {
      await this.fs.unlink(tempPath);
    } catch {
      // Ignore if file doesn't exist
    }

    let tempFileCreated = false;

    try {
      await this.fs.writeFile(tempPath, JSON.stringify(records, null, 2) + '\n', 'utf8');
      tempFileCreated = true;
      await this.fs.rename(tempPath, this.filePath);
    } catch (e) {
      if (tempFileCreated) {
        try {
          await this.fs.unlink(tempPath);
        } catch {
          // Ignore cleanup errors
        }
      }
      mapWriteError(e, this.filePath);
    }
  }
}

export function createStorageService(filePath: string, fs?: FsModule): StorageService {
  return new StorageServiceImpl(filePath, fs);
}
