export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigNotFoundError extends Error {
  constructor(path: string) {
    super(`Configuration file not found: ${path}. Run "todo init" to create one.`);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public issues: unknown[]) {
    super('Configuration validation failed');
    this.name = 'ConfigValidationError';
  }
}
