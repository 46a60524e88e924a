import type { StateStorage } from 'zustand/middleware';
import type { AppConfig } from './config';
import { LocalCacheStore } from './data/cacheStore';
import { DashboardAggregator } from './services/dashboard';
import { isCancelledError } from './services/errors';
import { type FetchLike, GivingAPI } from './services/givingAPI';
import { GivingRepository } from './services/givingRepository';
import { PaymentSessionManager } from './services/paymentSession';
import { type AppStore, createAppStore } from './store/appStore';
import { type Formatters, createFormatters } from './utils/format';
import { createFileStorage } from './utils/fileStorage';
import { Preferences } from './utils/storage';

export interface GivingAppOptions {
  config: AppConfig;
  /** Overrides the storage file named in the config. */
  storage?: StateStorage;
  fetchImpl?: FetchLike;
}

export interface GivingApp {
  config: AppConfig;
  preferences: Preferences;
  cache: LocalCacheStore;
  api: GivingAPI;
  store: AppStore;
  dashboard: DashboardAggregator;
  repository: GivingRepository;
  formatters: Formatters;
  createPaymentFlow(openPaymentPage: (url: string) => void | Promise<void>): PaymentSessionManager;
  /** Runs a user action and turns any failure into a dismissible notice. */
  withNotice<T>(action: () => Promise<T>): Promise<T | null>;
}

/**
 * Wires every long-lived collaborator once, at process start. There is
 * exactly one cache and one store per app instance.
 */
export const createGivingApp = ({ config, storage, fetchImpl }: GivingAppOptions): GivingApp => {
  const backend = storage ?? createFileStorage(config.storage.path);

  const preferences = new Preferences(backend, config.defaults.churchId);
  const cache = new LocalCacheStore(backend);
  const api = new GivingAPI({ baseUrl: config.api.baseUrl, preferences, fetchImpl });
  const store = createAppStore({ storage: backend, preferences, api });
  const dashboard = new DashboardAggregator({ api, store, cache });
  const repository = new GivingRepository({ api, cache, store });
  const formatters = createFormatters(config.defaults);

  return {
    config,
    preferences,
    cache,
    api,
    store,
    dashboard,
    repository,
    formatters,
    createPaymentFlow: (openPaymentPage) =>
      new PaymentSessionManager({
        api,
        preferences,
        cache,
        policy: config.payments,
        openPaymentPage,
        onSettled: () => {
          dashboard.load().catch((error: unknown) => {
            console.error('Failed to refresh dashboard after payment:', error);
          });
        },
      }),
    withNotice: async (action) => {
      try {
        return await action();
      } catch (error) {
        if (!isCancelledError(error)) {
          store.getState().reportError(error);
        }
        return null;
      }
    },
  };
};
