export type CollectionKey = 'teams' | 'matches' | 'settings';

export const COLLECTION_KEYS: readonly CollectionKey[] = ['teams', 'matches', 'settings'];

export type CollectionListener = (key: CollectionKey) => void;

export type StorageKind = 'memory' | 'postgres';

/**
 * Persistence collaborator. Collections are stored whole; every save or clear
 * notifies listeners of the affected key.
 */
export interface CollectionStorage {
  readonly kind: StorageKind;
  load(key: CollectionKey): Promise<unknown[]>;
  save(key: CollectionKey, items: readonly unknown[]): Promise<void>;
  clear(key: CollectionKey): Promise<void>;
  clearAll(): Promise<void>;
  onChange(listener: CollectionListener): () => void;
}

export * from './errors.js';
