import { afterEach, describe, expect, it, vi } from 'vitest';
import { LocalCacheStore } from '../data/cacheStore';
import { createAppStore } from '../store/appStore';
import type { GivingTransaction, UserProfile } from '../types';
import { Preferences, createMemoryStorage } from '../utils/storage';
import { DashboardAggregator, type DashboardSource, emptySummary } from './dashboard';
import { CancelledError, NetworkError } from './errors';

const PROFILE: UserProfile = { id: 4, first_name: 'Ada', last_name: 'Member', email: 'ada@example.com' };

const SUMMARY = { total_income: 1200, total_expenses: 200, net_income: 1000 };

const transactions = (count: number): GivingTransaction[] =>
  Array.from({ length: count }, (_, index): GivingTransaction => ({
    id: index + 1,
    category: 3,
    category_name: 'Tithe',
    amount: 100 * (index + 1),
    date: `2024-03-${String(index + 1).padStart(2, '0')}T09:00:00`,
    status: 'completed',
  }));

const setup = () => {
  const api = {
    getProfile: vi.fn<DashboardSource['getProfile']>().mockResolvedValue(PROFILE),
    getFinancialSummary: vi.fn<DashboardSource['getFinancialSummary']>().mockResolvedValue(SUMMARY),
    getGivingHistory: vi
      .fn<DashboardSource['getGivingHistory']>()
      .mockResolvedValue({ givings: transactions(3), count: 3 }),
  };
  const store = createAppStore({
    storage: createMemoryStorage(),
    preferences: new Preferences(createMemoryStorage()),
    api: { validateToken: vi.fn<() => Promise<boolean>>().mockResolvedValue(true) },
  });
  const cache = new LocalCacheStore(createMemoryStorage());
  const dashboard = new DashboardAggregator({
    api,
    store,
    cache,
    now: () => new Date('2024-03-05T10:30:00Z'),
  });
  return { api, store, cache, dashboard };
};

describe('DashboardAggregator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('publishes a snapshot with every section loaded', async () => {
    const { store, dashboard, api } = setup();

    const snapshot = await dashboard.load();

    expect(snapshot).toEqual({
      profile: PROFILE,
      summary: SUMMARY,
      recentTransactions: transactions(3),
      hasTransactions: true,
      loadedAt: '2024-03-05T10:30:00.000Z',
    });
    expect(store.getState().dashboard).toEqual(snapshot);
    expect(api.getGivingHistory).toHaveBeenCalledWith({ page: 1, pageSize: 5, signal: undefined });
  });

  it('keeps only the five most recent gifts in server order', async () => {
    const { api, dashboard } = setup();
    api.getGivingHistory.mockResolvedValue({ givings: transactions(12), count: 12 });

    const snapshot = await dashboard.load();

    expect(snapshot?.recentTransactions.map((transaction) => transaction.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it('falls back to a zero summary while the other sections stay live', async () => {
    const { api, dashboard } = setup();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    api.getFinancialSummary.mockRejectedValue(new NetworkError('Giving API error: 500 Internal Server Error', 500));

    const snapshot = await dashboard.load();

    expect(snapshot?.summary).toEqual(emptySummary());
    expect(snapshot?.profile).toEqual(PROFILE);
    expect(snapshot?.recentTransactions).toHaveLength(3);
  });

  it('reports no transactions when the history cannot be loaded', async () => {
    const { api, dashboard } = setup();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    api.getGivingHistory.mockRejectedValue(new NetworkError('offline'));
    api.getProfile.mockRejectedValue(new NetworkError('offline'));

    const snapshot = await dashboard.load();

    expect(snapshot).toMatchObject({ profile: null, summary: SUMMARY, recentTransactions: [], hasTransactions: false });
  });

  it('raises and clears the loading flag around a cycle', async () => {
    const { store, dashboard } = setup();
    const flags: boolean[] = [];
    store.subscribe((state, previous) => {
      if (state.isLoading !== previous.isLoading) {
        flags.push(state.isLoading);
      }
    });

    await dashboard.load();

    expect(flags).toEqual([true, false]);
  });

  it('caches the recent gifts for offline use', async () => {
    const { cache, dashboard } = setup();

    await dashboard.load();

    expect(cache.getAll('transactions').map((transaction) => transaction.id)).toEqual([1, 2, 3]);
  });

  it('lets the newest of two overlapping cycles win', async () => {
    const { store, dashboard } = setup();

    const [first, second] = await Promise.all([dashboard.load(), dashboard.load()]);

    expect(first).toBeNull();
    expect(second).not.toBeNull();
    expect(store.getState().dashboard).toEqual(second);
    expect(store.getState().isLoading).toBe(false);
  });

  it('applies nothing after the caller aborts', async () => {
    const { api, store, cache, dashboard } = setup();
    const controller = new AbortController();
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    api.getProfile.mockImplementation(async () => {
      controller.abort();
      throw new CancelledError('Request to /accounts/profile/ was cancelled');
    });

    const snapshot = await dashboard.load(controller.signal);

    expect(snapshot).toBeNull();
    expect(store.getState().dashboard).toBeNull();
    expect(store.getState().isLoading).toBe(false);
    expect(cache.getAll('transactions')).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });
});
