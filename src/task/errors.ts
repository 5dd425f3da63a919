/**
 * Запись задачи не соответствует схеме.
 */
export class TaskRecordError extends Error {
  constructor(
    message: string,
    public issues: unknown[] = [],
  ) {
    super(message);
    this.name = 'TaskRecordError';
  }
}
