import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Volume } from 'memfs';
import {
  createStorageService,
  type StorageService,
  StorageAccessError,
  StorageParseError,
  StorageWriteError,
} from './index.js';

type FsModule = typeof import('node:fs/promises');

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

/**
 * memfs promises API with some methods replaced.
 */
function withOverrides(vol: InstanceType<typeof Volume>, overrides: Record<string, unknown>): FsModule {
  return Object.assign(Object.create(vol.promises), overrides) as FsModule;
}

describe('StorageService', () => {
  let vol: InstanceType<typeof Volume>;
  let service: StorageService;

  beforeEach(() => {
    // Новый volume для каждого теста
    vol = Volume.fromJSON({});
    service = createStorageService('/data/todos.json', vol.promises as unknown as FsModule);
  });

  describe('read()', () => {
    it('должен вернуть null если файл не существует', async () => {
      await expect(service.read()).resolves.toBeNull();
    });

    it('должен вернуть записи из файла', async () => {
      vol.fromJSON({ '/data/todos.json': '[{"id":1,"title":"A"},{"id":2,"title":"B"}]' });

      const records = await service.read();

      expect(records).toEqual([
        { id: 1, title: 'A' },
        { id: 2, title: 'B' },
      ]);
    });

    it('должен вернуть пустой массив для пустого списка', async () => {
      vol.fromJSON({ '/data/todos.json': '[]' });

      await expect(service.read()).resolves.toEqual([]);
    });

    it('должен выбросить StorageParseError для malformed JSON', async () => {
      vol.fromJSON({ '/data/todos.json': '[{invalid}' });

      const err = await service.read().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StorageParseError);
      if (err instanceof StorageParseError) {
        expect(err.message).toBe('Невалидный JSON в файле /data/todos.json');
        expect(err.filePath).toBe('/data/todos.json');
        expect(err.parseMessage).toContain('JSON');
        expect(err.cause).toBeInstanceOf(SyntaxError);
      }
    });

    it('должен выбросить StorageParseError если JSON не массив', async () => {
      vol.fromJSON({ '/data/todos.json': '{"id":1}' });

      await expect(service.read()).rejects.toThrow(StorageParseError);
      await expect(service.read()).rejects.toThrow(
        'Файл /data/todos.json должен содержать массив задач',
      );
    });

    it('должен выбросить StorageAccessError если путь является директорией', async () => {
      await vol.promises.mkdir('/data/todos.json', { recursive: true });

      await expect(service.read()).rejects.toThrow(StorageAccessError);
    });
  });

  describe('write()', () => {
    it('должен записать pretty-printed JSON', async () => {
      await service.write([{ id: 1, title: 'A' }]);

      const files = vol.toJSON();
      expect(files['/data/todos.json']).toBe('[\n  {\n    "id": 1,\n    "title": "A"\n  }\n]\n');
    });

    it('должен создать директорию если её нет', async () => {
      const nested = createStorageService(
        '/deep/nested/dir/todos.json',
        vol.promises as unknown as FsModule,
      );

      await nested.write([]);

      expect(vol.toJSON()).toHaveProperty(['/deep/nested/dir/todos.json'], '[]\n');
    });

    it('должен полностью перезаписать файл', async () => {
      await service.write([{ id: 1 }, { id: 2 }]);
      await service.write([{ id: 3 }]);

      await expect(service.read()).resolves.toEqual([{ id: 3 }]);
    });

    it('должен удалить старый .tmp файл', async () => {
      vol.fromJSON({ '/data/todos.json.tmp': 'stale' });

      await service.write([]);

      const files = vol.toJSON();
      expect(files['/data/todos.json.tmp']).toBeUndefined();
      expect(files['/data/todos.json']).toBe('[]\n');
    });

    it('должен выбросить StorageWriteError при ENOSPC', async () => {
      const fs = withOverrides(vol, { writeFile: vi.fn().mockRejectedValue(errnoError('ENOSPC')) });
      const failing = createStorageService('/data/todos.json', fs);

      await expect(failing.write([])).rejects.toThrow(StorageWriteError);
      await expect(failing.write([])).rejects.toThrow(
        'Недостаточно места на диске: /data/todos.json',
      );
    });

    it('должен выбросить StorageAccessError при EACCES и убрать .tmp файл', async () => {
      const fs = withOverrides(vol, { rename: vi.fn().mockRejectedValue(errnoError('EACCES')) });
      const failing = createStorageService('/data/todos.json', fs);

      await expect(failing.write([{ id: 1 }])).rejects.toThrow(StorageAccessError);

      expect(vol.toJSON()['/data/todos.json.tmp']).toBeUndefined();
    });
  });
});
