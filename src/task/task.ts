import { z } from 'zod';
import { TaskRecordError } from './errors.js';
import { DEFAULT_CATEGORY, DEFAULT_PRIORITY, type Task, type TaskInit, type TaskRecord } from './types.js';

const taskRecordSchema = z
  .object({
    id: z.number().int().positive(),
    title: z.string(),
    priority: z.string().default(DEFAULT_PRIORITY),
    due_date: z.string().nullable().default(null),
    category: z.string().default(DEFAULT_CATEGORY),
    completed: z.boolean().default(false),
    created_at: z.string().nullish(),
  })
  .strict();

/**
 * Builds a task, filling defaults and lowercasing priority and category.
 * `createdAt` defaults to the current time.
 */
export function createTask(init: TaskInit, now: () => Date = () => new Date()): Task {
  return {
    id: init.id,
    title: init.title,
    priority: (init.priority ?? DEFAULT_PRIORITY).toLowerCase(),
    dueDate: init.dueDate ?? null,
    category: (init.category ?? DEFAULT_CATEGORY).toLowerCase(),
    completed: init.completed ?? false,
    createdAt: init.createdAt ?? now().toISOString(),
  };
}

export function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    priority: task.priority,
    due_date: task.dueDate,
    category: task.category,
    completed: task.completed,
    created_at: task.createdAt,
  };
}

/**
 * Restores a task from its stored form.
 *
 * `id` and `title` are required, the other fields fall back to their defaults.
 * A missing or null `created_at` is set to the current time.
 * Unknown keys and values of the wrong type are rejected.
 *
 * @throws {TaskRecordError} if the value does not match the record schema
 */
export function fromRecord(value: unknown, now: () => Date = () => new Date()): Task {
  const result = taskRecordSchema.safeParse(value);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new TaskRecordError(`Невалидная запись задачи: ${details}`, result.error.issues);
  }

  const record = result.data;
  return createTask(
    {
      id: record.id,
      title: record.title,
      priority: record.priority,
      dueDate: record.due_date,
      category: record.category,
      completed: record.completed,
      createdAt: record.created_at ?? undefined,
    },
    now,
  );
}
