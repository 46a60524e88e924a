// Giving API types
export type TransactionStatus = 'pending' | 'completed' | 'failed';

export interface GivingTransaction {
  id: number;
  category: number;
  category_name?: string;
  amount: number;
  date: string;
  status: TransactionStatus;
}

export interface GivingCategory {
  id: number;
  name: string;
  description?: string;
  is_active: boolean;
}

export interface Church {
  id: number;
  name: string;
  code?: string;
  city?: string;
}

export interface AppNotification {
  id: number;
  title: string;
  message: string;
  created_at: string;
  is_read: boolean;
}

export type GivingFrequency = 'daily' | 'weekly' | 'bi_weekly' | 'monthly' | 'quarterly' | 'yearly';

export type RecurringGivingStatus = 'active' | 'paused';

export interface RecurringGiving {
  id: number;
  category: number;
  category_name?: string;
  amount: number;
  frequency: GivingFrequency;
  next_payment_date: string;
  status: RecurringGivingStatus;
}

export interface Pledge {
  id: number;
  description: string;
  amount: number;
  amount_paid: number;
  target_date: string;
}

export interface FinancialSummary {
  total_income: number;
  total_expenses: number;
  net_income: number;
}

export interface UserProfile {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  church?: {
    id: number;
    name: string;
  };
}

export interface GivingHistory {
  givings: GivingTransaction[];
  count: number;
}

// Every backend response is wrapped in this envelope
export interface ApiEnvelope<T> {
  success: boolean;
  message?: string;
  data?: T;
}

// Payments
export interface PaymentSessionRequest {
  amount: number;
  categoryId: number;
  churchId: number;
}

export interface PaymentSession {
  reference: string;
  redirectUrl: string;
  transactionId?: number;
}

export interface PaymentStatusReport {
  reference: string;
  status: TransactionStatus;
  message?: string;
  transactionId?: number;
  processedAt?: string;
}

export interface GivingDraft {
  amount: number;
  categoryId: number | null;
  categoryName?: string;
}

// App-specific types
export interface AppSettings {
  enableOfflineMode: boolean;
}

export interface SyncStatus {
  lastSync?: string;
  isOnline: boolean;
  isSyncing: boolean;
}

export type NoticeKind = 'error' | 'warning' | 'info';

export interface Notice {
  kind: NoticeKind;
  title: string;
  message: string;
}

export interface DashboardSnapshot {
  profile: UserProfile | null;
  summary: FinancialSummary;
  recentTransactions: GivingTransaction[];
  hasTransactions: boolean;
  loadedAt: string;
}
