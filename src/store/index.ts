import { loadConfig } from '../config.js';
import type { CollectionStorage } from './types.js';
import { MemoryStorage } from './memory.js';
import { PostgresStorage } from './postgres.js';

export * from './types.js';

let storage: CollectionStorage | null = null;

export const getStorage = (): CollectionStorage => {
  if (!storage) {
    storage = loadConfig().databaseUrl ? new PostgresStorage() : new MemoryStorage();
  }
  return storage;
};
