import type { CacheKind, CachedEntities, LocalCacheStore } from '../data/cacheStore';
import type { AppStore } from '../store/appStore';
import type { Pledge, RecurringGiving } from '../types';
import { errorMessage, isNetworkError } from './errors';
import type { GivingAPI } from './givingAPI';

export const HISTORY_PAGE_SIZE = 50;

export interface SyncResult<T> {
  data: T[];
  /** True when the network failed and `data` came from the offline cache. */
  stale: boolean;
}

export type SyncReport = { [K in CacheKind]: SyncResult<CachedEntities[K]> };

export type RepositorySource = Pick<
  GivingAPI,
  | 'getGivingHistory'
  | 'getCategories'
  | 'getChurches'
  | 'getNotifications'
  | 'getRecurringGivings'
  | 'setRecurringGivingStatus'
  | 'getPledges'
>;

export interface GivingRepositoryDeps {
  api: RepositorySource;
  cache: LocalCacheStore;
  store: AppStore;
  now?: () => Date;
}

/**
 * Read side of the app: fresh data from the API when reachable, the cached
 * replica when not and offline mode is enabled. A successful refresh replaces
 * the cached kind wholesale.
 */
export class GivingRepository {
  private readonly now: () => Date;

  constructor(private readonly deps: GivingRepositoryDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  refreshTransactions(signal?: AbortSignal): Promise<SyncResult<CachedEntities['transactions']>> {
    return this.refresh('transactions', async () => {
      const history = await this.deps.api.getGivingHistory({ page: 1, pageSize: HISTORY_PAGE_SIZE, signal });
      return history.givings;
    });
  }

  refreshCategories(signal?: AbortSignal): Promise<SyncResult<CachedEntities['categories']>> {
    return this.refresh('categories', () => this.deps.api.getCategories(signal));
  }

  refreshChurches(signal?: AbortSignal): Promise<SyncResult<CachedEntities['churches']>> {
    return this.refresh('churches', () => this.deps.api.getChurches(signal));
  }

  refreshNotifications(signal?: AbortSignal): Promise<SyncResult<CachedEntities['notifications']>> {
    return this.refresh('notifications', () => this.deps.api.getNotifications(signal));
  }

  async syncAll(signal?: AbortSignal): Promise<SyncReport> {
    const { updateSyncStatus } = this.deps.store.getState();
    updateSyncStatus({ isSyncing: true });

    try {
      const [transactions, categories, churches, notifications] = await Promise.all([
        this.refreshTransactions(signal),
        this.refreshCategories(signal),
        this.refreshChurches(signal),
        this.refreshNotifications(signal),
      ]);
      const report: SyncReport = { transactions, categories, churches, notifications };

      const results = Object.values(report);
      const refreshed = results.filter((result) => !result.stale).length;
      updateSyncStatus({
        isOnline: refreshed > 0,
        ...(refreshed === results.length ? { lastSync: this.now().toISOString() } : {}),
      });
      return report;
    } finally {
      updateSyncStatus({ isSyncing: false });
    }
  }

  getRecurringGivings(signal?: AbortSignal): Promise<RecurringGiving[]> {
    return this.deps.api.getRecurringGivings(signal);
  }

  pauseRecurringGiving(id: number): Promise<RecurringGiving> {
    return this.deps.api.setRecurringGivingStatus(id, 'paused');
  }

  resumeRecurringGiving(id: number): Promise<RecurringGiving> {
    return this.deps.api.setRecurringGivingStatus(id, 'active');
  }

  getPledges(signal?: AbortSignal): Promise<Pledge[]> {
    return this.deps.api.getPledges(signal);
  }

  private async refresh<K extends CacheKind>(
    kind: K,
    fetchRecords: () => Promise<CachedEntities[K][]>
  ): Promise<SyncResult<CachedEntities[K]>> {
    const { cache, store } = this.deps;
    try {
      const records = await fetchRecords();
      cache.replaceAll(kind, records);
      return { data: cache.getAll(kind), stale: false };
    } catch (error) {
      if (!isNetworkError(error) || !store.getState().settings.enableOfflineMode) {
        throw error;
      }
      console.warn(`Serving cached ${kind}:`, errorMessage(error));
      return { data: cache.getAll(kind), stale: true };
    }
  }
}
