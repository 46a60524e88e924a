import { describe, expect, it } from 'vitest';
import { Preferences, STORAGE_KEYS, createMemoryStorage } from './storage';

describe('Preferences', () => {
  it('returns the default church when none was chosen', async () => {
    const preferences = new Preferences(createMemoryStorage());
    expect(await preferences.getChurchId()).toBe(1);
  });

  it('honours a custom default church', async () => {
    const preferences = new Preferences(createMemoryStorage(), 7);
    expect(await preferences.getChurchId()).toBe(7);
  });

  it('reads a stored church id back as a number', async () => {
    const preferences = new Preferences(createMemoryStorage());
    await preferences.setChurchId(42);
    expect(await preferences.getChurchId()).toBe(42);
  });

  it('falls back when the stored value is not an integer', async () => {
    const preferences = new Preferences(createMemoryStorage({ [STORAGE_KEYS.CHURCH_ID]: 'abc' }));
    expect(await preferences.getChurchId()).toBe(1);
    expect(await preferences.getInt('missing', 9)).toBe(9);
  });

  it('rejects non-integer writes', async () => {
    const preferences = new Preferences(createMemoryStorage());
    await expect(preferences.setInt('count', 1.5)).rejects.toThrow('Preference count expects an integer, got 1.5');
  });

  it('stores, trims and removes the auth token', async () => {
    const preferences = new Preferences(createMemoryStorage());
    expect(await preferences.hasAuthToken()).toBe(false);

    await preferences.setAuthToken('  test-token  ');
    expect(await preferences.getAuthToken()).toBe('test-token');
    expect(await preferences.hasAuthToken()).toBe(true);

    await preferences.removeAuthToken();
    expect(await preferences.getAuthToken()).toBeNull();
  });

  it('returns the caller default for strings that were never stored', async () => {
    const preferences = new Preferences(createMemoryStorage());
    expect(await preferences.getString('greeting', 'Karibu')).toBe('Karibu');
    await preferences.setString('greeting', 'Welcome');
    expect(await preferences.getString('greeting', 'Karibu')).toBe('Welcome');
  });

  it('falls back when the storage itself fails', async () => {
    const preferences = new Preferences({
      getItem: () => {
        throw new Error('disk gone');
      },
      setItem: () => undefined,
      removeItem: () => undefined,
    });
    expect(await preferences.getString('anything', 'fallback')).toBe('fallback');
  });
});
