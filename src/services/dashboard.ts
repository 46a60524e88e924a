import type { LocalCacheStore } from '../data/cacheStore';
import type { AppStore } from '../store/appStore';
import type { DashboardSnapshot, FinancialSummary, GivingTransaction } from '../types';
import { errorMessage, isCancelledError } from './errors';
import type { GivingAPI } from './givingAPI';

export const RECENT_TRANSACTION_LIMIT = 5;

export const emptySummary = (): FinancialSummary => ({
  total_income: 0,
  total_expenses: 0,
  net_income: 0,
});

export type DashboardSource = Pick<GivingAPI, 'getProfile' | 'getFinancialSummary' | 'getGivingHistory'>;

export interface DashboardDeps {
  api: DashboardSource;
  store: AppStore;
  cache: LocalCacheStore;
  now?: () => Date;
}

/**
 * Loads profile, summary and recent gifts for the dashboard. The three
 * requests run side by side and each one degrades to its own default, so one
 * failing section never blanks the others.
 */
export class DashboardAggregator {
  private cycle = 0;
  private readonly now: () => Date;

  constructor(private readonly deps: DashboardDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run a full load cycle. Resolves `null` when the cycle was aborted or a
   * newer one started meanwhile; nothing is applied in that case.
   */
  async load(signal?: AbortSignal): Promise<DashboardSnapshot | null> {
    const { api, store, cache } = this.deps;
    const cycle = ++this.cycle;
    store.getState().setLoading(true);

    const [profile, summary, recentTransactions] = await Promise.all([
      api.getProfile(signal).catch((error: unknown) => this.fallback('profile', error, null)),
      api.getFinancialSummary(signal).catch((error: unknown) => this.fallback('financial summary', error, emptySummary())),
      api
        .getGivingHistory({ page: 1, pageSize: RECENT_TRANSACTION_LIMIT, signal })
        .then((history) => history.givings.slice(0, RECENT_TRANSACTION_LIMIT))
        .catch((error: unknown) => this.fallback<GivingTransaction[]>('recent transactions', error, [])),
    ]);

    if (cycle !== this.cycle) {
      return null;
    }
    store.getState().setLoading(false);
    if (signal?.aborted) {
      return null;
    }

    for (const transaction of recentTransactions) {
      cache.put('transactions', transaction);
    }

    const snapshot: DashboardSnapshot = {
      profile,
      summary,
      recentTransactions,
      hasTransactions: recentTransactions.length > 0,
      loadedAt: this.now().toISOString(),
    };
    store.getState().setDashboard(snapshot);
    return snapshot;
  }

  private fallback<T>(section: string, error: unknown, value: T): T {
    if (!isCancelledError(error)) {
      console.warn(`Failed to load ${section}:`, errorMessage(error));
    }
    return value;
  }
}
