import { describe, expect, it } from 'vitest';
import type { GivingTransaction } from '../types';
import { createMemoryStorage } from '../utils/storage';
import { CACHE_SCHEMA_VERSION, CACHE_STORAGE_KEY, LocalCacheStore } from './cacheStore';

const buildTransaction = (overrides: Partial<GivingTransaction> = {}): GivingTransaction => ({
  id: 1,
  category: 3,
  category_name: 'Tithe',
  amount: 500,
  date: '2024-03-05T10:30:00',
  status: 'pending',
  ...overrides,
});

describe('LocalCacheStore', () => {
  it('returns a put record exactly once with its latest values', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('transactions', buildTransaction({ id: 1, status: 'pending' }));
    cache.put('transactions', buildTransaction({ id: 1, status: 'completed' }));

    const records = cache.getAll('transactions');
    expect(records).toHaveLength(1);
    expect(records[0]?.status).toBe('completed');
  });

  it('keeps insertion order and moves updated records to the end', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('transactions', buildTransaction({ id: 1 }));
    cache.put('transactions', buildTransaction({ id: 2 }));
    cache.put('transactions', buildTransaction({ id: 3 }));
    cache.put('transactions', buildTransaction({ id: 1, amount: 750 }));

    expect(cache.getAll('transactions').map((record) => record.id)).toEqual([2, 3, 1]);
  });

  it('keeps kinds apart', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('categories', { id: 1, name: 'Tithe', is_active: true });
    cache.put('churches', { id: 1, name: 'Grace Chapel' });

    expect(cache.getAll('categories')).toEqual([{ id: 1, name: 'Tithe', is_active: true }]);
    expect(cache.getAll('churches')).toEqual([{ id: 1, name: 'Grace Chapel' }]);
    expect(cache.getAll('transactions')).toEqual([]);
    expect(cache.getAll('notifications')).toEqual([]);
  });

  it('supersedes a kind wholesale on replaceAll', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('transactions', buildTransaction({ id: 1 }));
    cache.put('transactions', buildTransaction({ id: 2 }));

    cache.replaceAll('transactions', [buildTransaction({ id: 5 }), buildTransaction({ id: 6 })]);

    expect(cache.getAll('transactions').map((record) => record.id)).toEqual([5, 6]);
  });

  it('does not hand out its internal arrays', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('transactions', buildTransaction());
    cache.getAll('transactions').pop();

    expect(cache.getAll('transactions')).toHaveLength(1);
  });

  it('survives a restart on the same storage', () => {
    const storage = createMemoryStorage();
    const first = new LocalCacheStore(storage);
    first.put('notifications', {
      id: 9,
      title: 'Thank you',
      message: 'Your gift was received',
      created_at: '2024-03-05T10:30:00',
      is_read: false,
    });

    const second = new LocalCacheStore(storage);
    expect(second.getAll('notifications').map((record) => record.id)).toEqual([9]);
  });

  it('discards snapshots written by another schema version', () => {
    const storage = createMemoryStorage({
      [CACHE_STORAGE_KEY]: JSON.stringify({
        state: {
          records: { transactions: [buildTransaction()], categories: [], churches: [], notifications: [] },
        },
        version: CACHE_SCHEMA_VERSION - 1,
      }),
    });

    const cache = new LocalCacheStore(storage);
    expect(cache.getAll('transactions')).toEqual([]);
  });

  it('clears every kind', () => {
    const cache = new LocalCacheStore(createMemoryStorage());
    cache.put('transactions', buildTransaction());
    cache.put('categories', { id: 1, name: 'Offering', is_active: true });

    cache.clear();

    expect(cache.getAll('transactions')).toEqual([]);
    expect(cache.getAll('categories')).toEqual([]);
  });
});
