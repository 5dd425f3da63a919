export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}

export class StorageWriteError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageWriteError';
  }
}

export class StorageAccessError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageAccessError';
  }
}

/**
 * Файл данных существует, но не может быть разобран.
 */
export class StorageParseError extends StorageError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly parseMessage: string,
    /** Character offset in the JSON text, when the parser reports one */
    public readonly position?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'StorageParseError';
  }
}
