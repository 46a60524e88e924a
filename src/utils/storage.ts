import type { StateStorage } from 'zustand/middleware';

const STORAGE_KEYS = {
  AUTH_TOKEN: '@giving/auth_token',
  CHURCH_ID: '@giving/church_id',
} as const;

export const DEFAULT_CHURCH_ID = 1;

/**
 * Volatile key-value storage, used by tests and by runs that opt out of the
 * on-disk database.
 */
export const createMemoryStorage = (initial: Record<string, string> = {}): StateStorage => {
  const items = new Map(Object.entries(initial));

  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
  };
};

/**
 * Typed preference reads over a key-value storage. Every read takes the value
 * to use when nothing (or nothing parseable) is stored.
 */
export class Preferences {
  constructor(
    private readonly storage: StateStorage,
    private readonly defaultChurchId: number = DEFAULT_CHURCH_ID
  ) {}

  async getString(key: string, fallback: string): Promise<string> {
    try {
      const value = await this.storage.getItem(key);
      return value ?? fallback;
    } catch (error) {
      console.error(`Error reading preference ${key}:`, error);
      return fallback;
    }
  }

  async getInt(key: string, fallback: number): Promise<number> {
    const raw = await this.getString(key, '');
    if (!/^-?\d+$/.test(raw.trim())) {
      return fallback;
    }
    return Number.parseInt(raw, 10);
  }

  async setString(key: string, value: string): Promise<void> {
    try {
      await this.storage.setItem(key, value);
    } catch (error) {
      console.error(`Error storing preference ${key}:`, error);
      throw new Error(`Failed to store preference ${key}`);
    }
  }

  async setInt(key: string, value: number): Promise<void> {
    if (!Number.isInteger(value)) {
      throw new Error(`Preference ${key} expects an integer, got ${value}`);
    }
    await this.setString(key, String(value));
  }

  async remove(key: string): Promise<void> {
    try {
      await this.storage.removeItem(key);
    } catch (error) {
      console.error(`Error removing preference ${key}:`, error);
      throw new Error(`Failed to remove preference ${key}`);
    }
  }

  /**
   * The church gifts are credited to. Falls back to the default church when
   * the member never picked one.
   */
  getChurchId(): Promise<number> {
    return this.getInt(STORAGE_KEYS.CHURCH_ID, this.defaultChurchId);
  }

  setChurchId(churchId: number): Promise<void> {
    return this.setInt(STORAGE_KEYS.CHURCH_ID, churchId);
  }

  async getAuthToken(): Promise<string | null> {
    const token = await this.getString(STORAGE_KEYS.AUTH_TOKEN, '');
    return token || null;
  }

  setAuthToken(token: string): Promise<void> {
    return this.setString(STORAGE_KEYS.AUTH_TOKEN, token.trim());
  }

  removeAuthToken(): Promise<void> {
    return this.remove(STORAGE_KEYS.AUTH_TOKEN);
  }

  async hasAuthToken(): Promise<boolean> {
    return (await this.getAuthToken()) !== null;
  }
}

export { STORAGE_KEYS };
