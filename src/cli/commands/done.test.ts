import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Volume } from 'memfs';
import type { Config } from '../../config/types.js';
import type { Services } from '../services.js';
import { createStorageService, type StorageService } from '../../storage/storage.js';
import { TaskStore } from '../../store/store.js';
import { CliValidationError, TaskNotFoundError } from '../errors.js';
import { doneCommand, undoCommand } from './done.js';

const mockConfig: Config = {
  dataFile: '/todos.json',
  defaults: { priority: 'medium', category: 'general' },
};

describe('done / undo commands', () => {
  let storage: StorageService;
  let services: Services;

  beforeEach(async () => {
    const vol = Volume.fromJSON({
      '/todos.json': JSON.stringify([{ id: 4, title: 'Water plants', created_at: 't' }]),
    });
    storage = createStorageService(
      mockConfig.dataFile,
      vol.promises as unknown as typeof import('node:fs/promises'),
    );
    services = { config: mockConfig, store: await TaskStore.open(storage) };
  });

  it('должен отметить задачу выполненной', async () => {
    await expect(doneCommand({ id: '4' }, services)).resolves.toBe(4);

    expect(services.store.get(4)?.completed).toBe(true);
  });

  it('должен вернуть задачу в работу', async () => {
    await doneCommand({ id: '4' }, services);

    await expect(undoCommand({ id: '4' }, services)).resolves.toBe(4);

    expect(services.store.get(4)?.completed).toBe(false);
  });

  it('должен выбросить TaskNotFoundError для несуществующей задачи', async () => {
    const write = vi.spyOn(storage, 'write');

    await expect(doneCommand({ id: '5' }, services)).rejects.toThrow(TaskNotFoundError);
    await expect(undoCommand({ id: '5' }, services)).rejects.toThrow('Задача не найдена: 5');

    expect(write).not.toHaveBeenCalled();
  });

  it('должен выбросить CliValidationError для невалидного ID', async () => {
    await expect(doneCommand({ id: 'abc' }, services)).rejects.toThrow(CliValidationError);
  });
});
