import { EventEmitter } from 'node:events';
import { eq } from 'drizzle-orm';

import { getDb, type DbClient } from '../db/client.js';
import { collections } from '../db/schema.js';
import type { CollectionKey, CollectionListener, CollectionStorage } from './types.js';
import { COLLECTION_KEYS } from './types.js';

const CHANGE_EVENT = 'change';

export interface PostgresStorageOptions {
  db?: DbClient;
  now?: () => Date;
}

/**
 * Stores each collection as a single jsonb row. Change notifications are
 * process-local; other processes see new data on their next load.
 */
export class PostgresStorage implements CollectionStorage {
  readonly kind = 'postgres';
  private readonly db: DbClient;
  private readonly now: () => Date;
  private readonly emitter = new EventEmitter();

  constructor(options: PostgresStorageOptions = {}) {
    this.db = options.db ?? getDb();
    this.now = options.now ?? (() => new Date());
  }

  async load(key: CollectionKey): Promise<unknown[]> {
    const rows = await this.db
      .select({ payload: collections.payload })
      .from(collections)
      .where(eq(collections.collectionKey, key))
      .limit(1);

    const payload = rows[0]?.payload;
    return Array.isArray(payload) ? payload : [];
  }

  async save(key: CollectionKey, items: readonly unknown[]): Promise<void> {
    const timestamp = this.now();
    const payload = [...items];
    await this.db
      .insert(collections)
      .values({ collectionKey: key, payload, createdAt: timestamp, updatedAt: timestamp })
      .onConflictDoUpdate({
        target: collections.collectionKey,
        set: { payload, updatedAt: timestamp },
      });
    this.notify(key);
  }

  async clear(key: CollectionKey): Promise<void> {
    await this.db.delete(collections).where(eq(collections.collectionKey, key));
    this.notify(key);
  }

  async clearAll(): Promise<void> {
    await this.db.delete(collections);
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
