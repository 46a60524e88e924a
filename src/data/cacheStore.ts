import { createStore, type StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import type { AppNotification, Church, GivingCategory, GivingTransaction } from '../types';

/**
 * Bump whenever a cached entity changes shape. Snapshots written under any
 * other version are thrown away on load, not migrated.
 */
export const CACHE_SCHEMA_VERSION = 1;

export const CACHE_STORAGE_KEY = 'giving-cache';

export interface CachedEntities {
  transactions: GivingTransaction;
  categories: GivingCategory;
  churches: Church;
  notifications: AppNotification;
}

export type CacheKind = keyof CachedEntities;

export type CacheRecords = { [K in CacheKind]: CachedEntities[K][] };

export const CACHE_KINDS: readonly CacheKind[] = ['transactions', 'categories', 'churches', 'notifications'];

interface CacheState {
  records: CacheRecords;
}

const emptyRecords = (): CacheRecords => ({
  transactions: [],
  categories: [],
  churches: [],
  notifications: [],
});

// Last write wins: an existing record with the same id is dropped and the new
// one goes to the end.
const upsert = <T extends { id: number }>(records: readonly T[], entity: T): T[] => [
  ...records.filter((record) => record.id !== entity.id),
  entity,
];

/**
 * Offline replica of the entities the app shows when the network is down.
 * Construct one per process and pass it to whoever needs it.
 */
export class LocalCacheStore {
  private readonly store: StoreApi<CacheState>;

  constructor(storage: StateStorage) {
    this.store = createStore<CacheState>()(
      persist(() => ({ records: emptyRecords() }), {
        name: CACHE_STORAGE_KEY,
        storage: createJSONStorage(() => storage),
        version: CACHE_SCHEMA_VERSION,
        migrate: (_persistedState, version) => {
          console.warn(`Discarding offline cache written by schema version ${version}`);
          return { records: emptyRecords() };
        },
      })
    );
  }

  put<K extends CacheKind>(kind: K, entity: CachedEntities[K]): void {
    this.store.setState((state) => {
      const records = { ...state.records };
      records[kind] = upsert(state.records[kind], entity);
      return { records };
    });
  }

  replaceAll<K extends CacheKind>(kind: K, entities: readonly CachedEntities[K][]): void {
    this.store.setState((state) => {
      const records = { ...state.records };
      records[kind] = entities.reduce<CachedEntities[K][]>((next, entity) => upsert(next, entity), []);
      return { records };
    });
  }

  getAll<K extends CacheKind>(kind: K): CachedEntities[K][] {
    const records: CachedEntities[K][] = this.store.getState().records[kind];
    return [...records];
  }

  clear(): void {
    this.store.setState({ records: emptyRecords() });
  }
}
