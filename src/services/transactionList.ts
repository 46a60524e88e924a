import type { GivingTransaction, TransactionStatus } from '../types';
import { DATE_PATTERN, type Formatters, humanize } from '../utils/format';

export const DEFAULT_CATEGORY_LABEL = 'General';

export type StatusTone = 'success' | 'warning' | 'danger';

export interface TransactionListItem {
  id: number;
  categoryLabel: string;
  amountText: string;
  dateText: string;
  status: TransactionStatus;
  statusLabel: string;
  tone: StatusTone;
}

const STATUS_TONES: Record<TransactionStatus, StatusTone> = {
  completed: 'success',
  pending: 'warning',
  failed: 'danger',
};

// Dates are absorbed here even if a formatter throws; the raw value is shown.
const formatDateSafely = (raw: string, formatters: Formatters, pattern: string): string => {
  try {
    return formatters.formatDate(raw, pattern);
  } catch (error) {
    console.warn(`Showing unformatted date "${raw}":`, error);
    return raw;
  }
};

export const toTransactionListItem = (
  transaction: GivingTransaction,
  formatters: Formatters,
  datePattern: string = DATE_PATTERN
): TransactionListItem => ({
  id: transaction.id,
  categoryLabel: transaction.category_name?.trim() || DEFAULT_CATEGORY_LABEL,
  amountText: formatters.formatCurrency(transaction.amount),
  dateText: formatDateSafely(transaction.date, formatters, datePattern),
  status: transaction.status,
  statusLabel: humanize(transaction.status),
  tone: STATUS_TONES[transaction.status],
});

// Order is whatever the caller passes in; rows are never re-sorted here.
export const projectTransactions = (
  transactions: readonly GivingTransaction[],
  formatters: Formatters,
  datePattern?: string
): TransactionListItem[] => transactions.map((transaction) => toTransactionListItem(transaction, formatters, datePattern));
