/**
 * Задача с указанным ID отсутствует.
 * The store reports this as `false`; commands turn it into this error.
 */
export class TaskNotFoundError extends Error {
  constructor(public readonly id: number) {
    super(`Задача не найдена: ${id}`);
    this.name = 'TaskNotFoundError';
  }
}

/**
 * Невалидный аргумент или опция командной строки.
 */
export class CliValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliValidationError';
  }
}
