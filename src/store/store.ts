import type { StorageService } from '../storage/storage.js';
import { StorageParseError } from '../storage/errors.js';
import { TaskRecordError } from '../task/errors.js';
import { createTask, fromRecord, toRecord } from '../task/task.js';
import { DEFAULT_CATEGORY, DEFAULT_PRIORITY, type Task } from '../task/types.js';
import { sortTasks } from '../utils/sort.js';
import type { AddTaskOptions, EditTaskOptions, ListTasksOptions, TaskStats } from './types.js';

/**
 * In-memory list of tasks backed by a single data file.
 *
 * Every mutation that changes something writes the full list back through
 * {@link StorageService.write}. Lookups by id are linear scans.
 */
export class TaskStore {
  private tasks: Task[] = [];
  private nextId = 1;

  constructor(
    private readonly storage: StorageService,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Creates a store and loads the data file into it.
   */
  static async open(storage: StorageService, now?: () => Date): Promise<TaskStore> {
    const store = new TaskStore(storage, now);
    await store.load();
    return store;
  }

  /**
   * Replaces the in-memory list with the contents of the data file.
   * A missing file leaves the store empty.
   *
   * @throws {StorageParseError} if the file or one of its records is malformed
   */
  async load(): Promise<void> {
    const records = (await this.storage.read()) ?? [];

    const tasks: Task[] = [];
    for (const [position, record] of records.entries()) {
      try {
        tasks.push(fromRecord(record, this.now));
      } catch (e) {
        if (e instanceof TaskRecordError) {
          throw new StorageParseError(
            `Невалидная задача #${position + 1} в файле ${this.storage.filePath}`,
            this.storage.filePath,
            e.message,
            undefined,
            e,
          );
        }
        throw e;
      }
    }

    this.tasks = tasks;
    this.nextId = tasks.reduce((max, task) => Math.max(max, task.id), 0) + 1;
  }

  async save(): Promise<void> {
    await this.storage.write(this.tasks.map(toRecord));
  }

  /** Snapshot of every task in insertion order. */
  get all(): Task[] {
    return [...this.tasks];
  }

  /** Id the next added task will receive. */
  get nextTaskId(): number {
    return this.nextId;
  }

  get(id: number): Task | undefined {
    return this.tasks.find((task) => task.id === id);
  }

  async add(title: string, options: AddTaskOptions = {}): Promise<Task> {
    const task = createTask(
      {
        id: this.nextId,
        title,
        priority: options.priority ?? DEFAULT_PRIORITY,
        dueDate: options.dueDate ?? null,
        category: options.category ?? DEFAULT_CATEGORY,
      },
      this.now,
    );

    this.tasks.push(task);
    this.nextId += 1;
    await this.save();
    return task;
  }

  /**
   * Pending tasks (or every task with `all`), filtered and sorted by priority,
   * then due date.
   */
  list(options: ListTasksOptions = {}): Task[] {
    let result = options.all ? [...this.tasks] : this.tasks.filter((task) => !task.completed);

    if (options.category) {
      const category = options.category.toLowerCase();
      result = result.filter((task) => task.category === category);
    }
    if (options.priority) {
      const priority = options.priority.toLowerCase();
      result = result.filter((task) => task.priority === priority);
    }

    return sortTasks(result);
  }

  async complete(id: number): Promise<boolean> {
    return this.setCompleted(id, true);
  }

  async uncomplete(id: number): Promise<boolean> {
    return this.setCompleted(id, false);
  }

  async delete(id: number): Promise<boolean> {
    const index = this.tasks.findIndex((task) => task.id === id);
    if (index === -1) {
      return false;
    }

    this.tasks.splice(index, 1);
    await this.save();
    return true;
  }

  async edit(id: number, changes: EditTaskOptions): Promise<boolean> {
    const task = this.get(id);
    if (!task) {
      return false;
    }

    if (changes.title) {
      task.title = changes.title;
    }
    if (changes.priority) {
      task.priority = changes.priority.toLowerCase();
    }
    // Unlike the fields above, an empty due date clears it
    if (changes.dueDate !== undefined) {
      task.dueDate = changes.dueDate || null;
    }
    if (changes.category) {
      task.category = changes.category.toLowerCase();
    }

    await this.save();
    return true;
  }

  stats(): TaskStats {
    const total = this.tasks.length;
    const completed = this.tasks.filter((task) => task.completed).length;
    // Category and priority names may match Object.prototype members (`constructor`, `__proto__`)
    const priorityCounts = new Map<string, number>();
    const categoryCounts = new Map<string, number>();

    for (const task of this.tasks) {
      if (task.completed) continue;
      priorityCounts.set(task.priority, (priorityCounts.get(task.priority) ?? 0) + 1);
      categoryCounts.set(task.category, (categoryCounts.get(task.category) ?? 0) + 1);
    }

    return {
      total,
      completed,
      pending: total - completed,
      byPriority: { high: 0, medium: 0, low: 0, ...Object.fromEntries(priorityCounts) },
      byCategory: Object.fromEntries(categoryCounts),
    };
  }

  /**
   * Removes every completed task.
   * @returns Number of removed tasks; the file is written only when it is non-zero
   */
  async clearCompleted(): Promise<number> {
    const originalCount = this.tasks.length;
    this.tasks = this.tasks.filter((task) => !task.completed);

    const removed = originalCount - this.tasks.length;
    if (removed > 0) {
      await this.save();
    }
    return removed;
  }

  private async setCompleted(id: number, completed: boolean): Promise<boolean> {
    const task = this.get(id);
    if (!task) {
      return false;
    }

    task.completed = completed;
    await this.save();
    return true;
  }
}
