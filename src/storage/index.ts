export {
  StorageAccessError,
  StorageError,
  StorageParseError,
  StorageWriteError,
} from './errors.js';
export { createStorageService, StorageServiceImpl, type StorageService } from './storage.js';
