import type {
  AppNotification,
  Church,
  FinancialSummary,
  GivingCategory,
  GivingFrequency,
  GivingHistory,
  GivingTransaction,
  PaymentSession,
  PaymentStatusReport,
  Pledge,
  RecurringGiving,
  RecurringGivingStatus,
  TransactionStatus,
  UserProfile,
} from '../types';
import { NetworkError } from './errors';

type JsonObject = Record<string, unknown>;

export type Parser<T> = (value: unknown) => T;

const FREQUENCIES: readonly GivingFrequency[] = ['daily', 'weekly', 'bi_weekly', 'monthly', 'quarterly', 'yearly'];

const malformed = (what: string): NetworkError => new NetworkError(`Malformed ${what} in server response`);

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asObject = (value: unknown, what: string): JsonObject => {
  if (!isObject(value)) {
    throw malformed(what);
  }
  return value;
};

// Decimal fields are serialized as strings ("500.00")
const toNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const requireNumber = (source: JsonObject, key: string, what: string): number => {
  const value = toNumber(source[key]);
  if (value === undefined) {
    throw malformed(`${what}.${key}`);
  }
  return value;
};

const requireString = (source: JsonObject, key: string, what: string): string => {
  const value = source[key];
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw malformed(`${what}.${key}`);
  }
  return value;
};

const optionalString = (source: JsonObject, key: string): string | undefined => {
  const value = source[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

/**
 * Collapse the server's status vocabulary onto the three states the app
 * tracks. Anything unrecognised counts as still pending, never as settled.
 */
export const parseTransactionStatus = (value: unknown): TransactionStatus => {
  const status = typeof value === 'string' ? value.trim().toLowerCase() : '';
  switch (status) {
    case 'completed':
    case 'success':
    case 'successful':
      return 'completed';
    case 'failed':
    case 'cancelled':
    case 'expired':
    case 'declined':
      return 'failed';
    default:
      return 'pending';
  }
};

export const parseList =
  <T>(parser: Parser<T>, what: string): Parser<T[]> =>
  (value) => {
    const items = isObject(value) && Array.isArray(value.results) ? value.results : value;
    if (!Array.isArray(items)) {
      throw malformed(`${what} list`);
    }
    return items.map(parser);
  };

export const parseTransaction: Parser<GivingTransaction> = (value) => {
  const raw = asObject(value, 'transaction');
  return {
    id: requireNumber(raw, 'id', 'transaction'),
    category: requireNumber(raw, 'category', 'transaction'),
    category_name: optionalString(raw, 'category_name'),
    amount: requireNumber(raw, 'amount', 'transaction'),
    date: requireString(raw, 'date', 'transaction'),
    status: parseTransactionStatus(raw.status),
  };
};

export const parseGivingHistory: Parser<GivingHistory> = (value) => {
  const raw = asObject(value, 'giving history');
  const givings = parseList(parseTransaction, 'giving history')(raw.givings);
  return {
    givings,
    count: toNumber(raw.count) ?? givings.length,
  };
};

export const parseCategory: Parser<GivingCategory> = (value) => {
  const raw = asObject(value, 'category');
  return {
    id: requireNumber(raw, 'id', 'category'),
    name: requireString(raw, 'name', 'category'),
    description: optionalString(raw, 'description'),
    is_active: raw.is_active !== false,
  };
};

export const parseChurch: Parser<Church> = (value) => {
  const raw = asObject(value, 'church');
  return {
    id: requireNumber(raw, 'id', 'church'),
    name: requireString(raw, 'name', 'church'),
    code: optionalString(raw, 'code'),
    city: optionalString(raw, 'city'),
  };
};

export const parseNotification: Parser<AppNotification> = (value) => {
  const raw = asObject(value, 'notification');
  return {
    id: requireNumber(raw, 'id', 'notification'),
    title: requireString(raw, 'title', 'notification'),
    message: optionalString(raw, 'message') ?? '',
    created_at: requireString(raw, 'created_at', 'notification'),
    is_read: raw.is_read === true,
  };
};

const parseFrequency = (value: unknown): GivingFrequency => {
  const frequency = FREQUENCIES.find((candidate) => candidate === value);
  if (!frequency) {
    throw malformed('recurring giving.frequency');
  }
  return frequency;
};

const parseRecurringStatus = (value: unknown): RecurringGivingStatus => (value === 'active' ? 'active' : 'paused');

export const parseRecurringGiving: Parser<RecurringGiving> = (value) => {
  const raw = asObject(value, 'recurring giving');
  return {
    id: requireNumber(raw, 'id', 'recurring giving'),
    category: requireNumber(raw, 'category', 'recurring giving'),
    category_name: optionalString(raw, 'category_name'),
    amount: requireNumber(raw, 'amount', 'recurring giving'),
    frequency: parseFrequency(raw.frequency),
    next_payment_date: requireString(raw, 'next_payment_date', 'recurring giving'),
    status: parseRecurringStatus(raw.status),
  };
};

export const parsePledge: Parser<Pledge> = (value) => {
  const raw = asObject(value, 'pledge');
  return {
    id: requireNumber(raw, 'id', 'pledge'),
    description: optionalString(raw, 'description') ?? '',
    amount: requireNumber(raw, 'amount', 'pledge'),
    amount_paid: toNumber(raw.amount_paid) ?? 0,
    target_date: requireString(raw, 'target_date', 'pledge'),
  };
};

export const parseFinancialSummary: Parser<FinancialSummary> = (value) => {
  const raw = asObject(value, 'financial summary');
  const totalIncome = toNumber(raw.total_income) ?? 0;
  const totalExpenses = toNumber(raw.total_expenses) ?? 0;
  return {
    total_income: totalIncome,
    total_expenses: totalExpenses,
    net_income: toNumber(raw.net_income) ?? toNumber(raw.balance) ?? totalIncome - totalExpenses,
  };
};

export const parseProfile: Parser<UserProfile> = (value) => {
  const raw = asObject(value, 'profile');
  const church = isObject(raw.church) ? raw.church : undefined;
  return {
    id: requireNumber(raw, 'id', 'profile'),
    first_name: optionalString(raw, 'first_name') ?? '',
    last_name: optionalString(raw, 'last_name') ?? '',
    email: optionalString(raw, 'email') ?? '',
    church: church
      ? { id: requireNumber(church, 'id', 'profile.church'), name: requireString(church, 'name', 'profile.church') }
      : undefined,
  };
};

export const parsePaymentSession: Parser<PaymentSession> = (value) => {
  const raw = asObject(value, 'payment session');
  return {
    reference: requireString(raw, 'reference', 'payment session'),
    redirectUrl: requireString(raw, 'authorization_url', 'payment session'),
    transactionId: toNumber(raw.transaction_id),
  };
};

export const parsePaymentStatus =
  (reference: string): Parser<PaymentStatusReport> =>
  (value) => {
    const raw = asObject(value, 'payment status');
    return {
      reference,
      status: parseTransactionStatus(raw.status),
      message: optionalString(raw, 'message'),
      transactionId: toNumber(raw.transaction_id),
      processedAt: optionalString(raw, 'processed_at'),
    };
  };

/**
 * Unwrap the `{ success, message, data }` envelope every endpoint returns.
 */
export const parseEnvelope = <T>(body: unknown, parser: Parser<T>, endpoint: string): T => {
  const envelope = asObject(body, `${endpoint} envelope`);
  if (envelope.success !== true) {
    throw new NetworkError(optionalString(envelope, 'message') ?? `Request to ${endpoint} was not successful`);
  }
  return parser(envelope.data);
};
