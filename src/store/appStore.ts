import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import { describeError } from '../services/errors';
import type { GivingAPI } from '../services/givingAPI';
import type { AppSettings, DashboardSnapshot, Notice, SyncStatus } from '../types';
import type { Preferences } from '../utils/storage';

export const APP_STORE_KEY = 'giving-app-store';

export interface AppState {
  // Authentication
  isAuthenticated: boolean;
  setAuthenticated: (authenticated: boolean) => void;
  checkAuthStatus: () => Promise<void>;
  testConnection: () => Promise<boolean>;

  // Settings
  settings: AppSettings;
  updateSettings: (settings: Partial<AppSettings>) => void;

  // Sync status
  syncStatus: SyncStatus;
  updateSyncStatus: (status: Partial<SyncStatus>) => void;

  // Dashboard
  dashboard: DashboardSnapshot | null;
  setDashboard: (dashboard: DashboardSnapshot) => void;

  // UI state
  isLoading: boolean;
  setLoading: (loading: boolean) => void;
  notice: Notice | null;
  showNotice: (notice: Notice) => void;
  reportError: (error: unknown) => void;
  dismissNotice: () => void;
}

export interface AppStoreDeps {
  storage: StateStorage;
  preferences: Preferences;
  api: Pick<GivingAPI, 'validateToken'>;
}

export const createAppStore = ({ storage, preferences, api }: AppStoreDeps) =>
  createStore<AppState>()(
    persist(
      (set) => ({
        // Authentication
        isAuthenticated: false,
        setAuthenticated: (isAuthenticated) => set({ isAuthenticated }),
        checkAuthStatus: async () => {
          try {
            const hasToken = await preferences.hasAuthToken();
            set({ isAuthenticated: hasToken });
          } catch (error) {
            console.error('Error checking auth status:', error);
            set({ isAuthenticated: false });
          }
        },
        testConnection: async () => {
          const success = await api.validateToken();
          set({ isAuthenticated: success });
          if (!success) {
            set({
              notice: {
                kind: 'warning',
                title: 'Sign in again',
                message: 'Your session could not be verified. Sign in again to keep giving online.',
              },
            });
          }
          return success;
        },

        // Settings
        settings: {
          enableOfflineMode: true,
        },
        updateSettings: (newSettings) =>
          set((state) => ({
            settings: { ...state.settings, ...newSettings },
          })),

        // Sync status
        syncStatus: {
          isOnline: true,
          isSyncing: false,
        },
        updateSyncStatus: (status) =>
          set((state) => ({
            syncStatus: { ...state.syncStatus, ...status },
          })),

        // Dashboard
        dashboard: null,
        setDashboard: (dashboard) => set({ dashboard }),

        // UI state
        isLoading: false,
        setLoading: (isLoading) => set({ isLoading }),
        notice: null,
        showNotice: (notice) => set({ notice }),
        reportError: (error) => set({ notice: describeError(error) }),
        dismissNotice: () => set({ notice: null }),
      }),
      {
        name: APP_STORE_KEY,
        storage: createJSONStorage(() => storage),
        partialize: (state) => ({
          settings: state.settings,
          syncStatus: { ...state.syncStatus, isSyncing: false },
          // Auth is re-checked against stored credentials on start
        }),
      }
    )
  );

export type AppStore = ReturnType<typeof createAppStore>;
