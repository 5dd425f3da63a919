import { PRIORITIES, type Priority } from '../task/types.js';
import { CliValidationError } from '../cli/errors.js';

/**
 * ID задачи: положительное целое без знака и ведущих нулей
 */
export const ID_REGEX = /^[1-9]\d*$/;

/**
 * Дата срока в формате YYYY-MM-DD
 */
export const DUE_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Разбирает ID задачи из аргумента CLI.
 * @throws {CliValidationError} при невалидном ID
 */
export function parseTaskId(value: string): number {
  const trimmed = value.trim();
  if (!ID_REGEX.test(trimmed)) {
    throw new CliValidationError(`Невалидный ID задачи: ${value}`);
  }
  const id = Number(trimmed);
  if (!Number.isSafeInteger(id)) {
    throw new CliValidationError(`Невалидный ID задачи: ${value}`);
  }
  return id;
}

export function isPriority(value: string): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}

/**
 * @throws {CliValidationError} если приоритет не high, medium или low
 */
export function validatePriority(value: string): Priority {
  const normalized = value.trim().toLowerCase();
  if (!isPriority(normalized)) {
    throw new CliValidationError(
      `Невалидный приоритет: ${value}. Допустимые значения: ${PRIORITIES.join(', ')}`,
    );
  }
  return normalized;
}

/**
 * Проверяет формат и существование даты (2025-02-30 отклоняется).
 * @throws {CliValidationError} при невалидной дате
 */
export function validateDueDate(value: string): string {
  const trimmed = value.trim();
  const match = DUE_DATE_REGEX.exec(trimmed);
  if (match) {
    const [, year, month, day] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day
    ) {
      return trimmed;
    }
  }
  throw new CliValidationError(`Невалидная дата: ${value}. Ожидается формат YYYY-MM-DD`);
}
