export { createGivingApp } from './app';
export type { GivingApp, GivingAppOptions } from './app';
export { loadConfig, resolveConfig } from './config';
export type { AppConfig } from './config';
export { CACHE_KINDS, CACHE_SCHEMA_VERSION, LocalCacheStore } from './data/cacheStore';
export type { CacheKind, CachedEntities } from './data/cacheStore';
export { DashboardAggregator, RECENT_TRANSACTION_LIMIT, emptySummary } from './services/dashboard';
export * from './services/errors';
export { GivingAPI } from './services/givingAPI';
export type { FetchLike } from './services/givingAPI';
export { GivingRepository } from './services/givingRepository';
export type { SyncReport, SyncResult } from './services/givingRepository';
export { PaymentSessionManager, validateDraft } from './services/paymentSession';
export type { PaymentPhase, PaymentPolicy, PaymentSessionState } from './services/paymentSession';
export { pledgeProgressPercent, toPledgeProgress, toRecurringGivingItem } from './services/givingSchedules';
export type { PledgeProgress, RecurringGivingItem } from './services/givingSchedules';
export { projectTransactions, toTransactionListItem } from './services/transactionList';
export type { TransactionListItem } from './services/transactionList';
export { createAppStore } from './store/appStore';
export type { AppState, AppStore } from './store/appStore';
export type * from './types';
export { createFormatters, formatDate } from './utils/format';
export type { Formatters } from './utils/format';
export { createFileStorage } from './utils/fileStorage';
export { Preferences, createMemoryStorage } from './utils/storage';
