import { EventEmitter } from 'node:events';

import type { CollectionKey, CollectionListener, CollectionStorage } from './types.js';
import { COLLECTION_KEYS } from './types.js';

const CHANGE_EVENT = 'change';

// Values round-trip through JSON so callers never share references with the store.
const cloneItems = (items: readonly unknown[]): unknown[] => JSON.parse(JSON.stringify(items));

export class MemoryStorage implements CollectionStorage {
  readonly kind = 'memory';
  private readonly collections = new Map<CollectionKey, unknown[]>();
  private readonly emitter = new EventEmitter();

  constructor(seed: Partial<Record<CollectionKey, unknown[]>> = {}) {
    for (const key of COLLECTION_KEYS) {
      const items = seed[key];
      if (items) this.collections.set(key, cloneItems(items));
    }
  }

  async load(key: CollectionKey): Promise<unknown[]> {
    return cloneItems(this.collections.get(key) ?? []);
  }

  async save(key: CollectionKey, items: readonly unknown[]): Promise<void> {
    this.collections.set(key, cloneItems(items));
    this.notify(key);
  }

  async clear(key: CollectionKey): Promise<void> {
    this.collections.delete(key);
    this.notify(key);
  }

  async clearAll(): Promise<void> {
    this.collections.clear();
    for (const key of COLLECTION_KEYS) this.notify(key);
  }

  onChange(listener: CollectionListener): () => void {
    this.emitter.on(CHANGE_EVENT, listener);
    return () => {
      this.emitter.off(CHANGE_EVENT, listener);
    };
  }

  private notify(key: CollectionKey) {
    this.emitter.emit(CHANGE_EVENT, key);
  }
}
