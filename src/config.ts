import dotenv from 'dotenv';
import { DEFAULT_CHURCH_ID } from './utils/storage';

const DEFAULT_API_URL = 'http://localhost:8000/api';
const DEFAULT_STORAGE_PATH = 'giving-cache.json';
const DEFAULT_POLL_INTERVAL_MS = 3000;
const DEFAULT_MAX_POLL_ATTEMPTS = 10;
const DEFAULT_CURRENCY = 'KES';
const DEFAULT_LOCALE = 'en-KE';

export interface AppConfig {
  api: {
    baseUrl: string;
  };
  storage: {
    /** JSON file holding preferences and the offline cache. */
    path: string;
  };
  payments: {
    pollIntervalMs: number;
    maxPollAttempts: number;
  };
  defaults: {
    churchId: number;
    currency: string;
    locale: string;
  };
}

function normalize(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function positiveInt(value: unknown, fallback: number): number {
  const parsed = Number(normalize(value));
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    api: {
      baseUrl: (normalize(env.GIVING_API_URL) || DEFAULT_API_URL).replace(/\/+$/, ''),
    },
    storage: {
      path: normalize(env.GIVING_STORAGE_PATH) || DEFAULT_STORAGE_PATH,
    },
    payments: {
      pollIntervalMs: positiveInt(env.GIVING_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
      maxPollAttempts: positiveInt(env.GIVING_MAX_POLL_ATTEMPTS, DEFAULT_MAX_POLL_ATTEMPTS),
    },
    defaults: {
      churchId: positiveInt(env.GIVING_DEFAULT_CHURCH_ID, DEFAULT_CHURCH_ID),
      currency: normalize(env.GIVING_CURRENCY).toUpperCase() || DEFAULT_CURRENCY,
      locale: normalize(env.GIVING_LOCALE) || DEFAULT_LOCALE,
    },
  };
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return resolveConfig(process.env);
}
