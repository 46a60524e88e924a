import type { Pledge, RecurringGiving, RecurringGivingStatus } from '../types';
import { DATE_PATTERN, type Formatters, humanize } from '../utils/format';

export interface PledgeProgress {
  id: number;
  title: string;
  targetText: string;
  paidText: string;
  /** Whole percent paid. Goes past 100 when the member gave more than pledged. */
  progressPercent: number;
  /** `progressPercent` clamped to 0..100 for progress bars. */
  barPercent: number;
  isOverpaid: boolean;
  deadlineText: string;
}

export interface RecurringGivingItem {
  id: number;
  title: string;
  amountText: string;
  frequencyLabel: string;
  nextDateText: string;
  status: RecurringGivingStatus;
  statusLabel: string;
}

export const pledgeProgressPercent = (pledge: Pick<Pledge, 'amount' | 'amount_paid'>): number =>
  pledge.amount > 0 ? Math.floor((pledge.amount_paid / pledge.amount) * 100) : 0;

export const toPledgeProgress = (pledge: Pledge, formatters: Formatters): PledgeProgress => {
  const progressPercent = pledgeProgressPercent(pledge);

  return {
    id: pledge.id,
    title: pledge.description || 'Pledge',
    targetText: formatters.formatCurrency(pledge.amount),
    paidText: formatters.formatCurrency(pledge.amount_paid),
    progressPercent,
    barPercent: Math.min(100, Math.max(0, progressPercent)),
    isOverpaid: pledge.amount > 0 && pledge.amount_paid > pledge.amount,
    deadlineText: `Target: ${formatters.formatDate(pledge.target_date, DATE_PATTERN)}`,
  };
};

export const toRecurringGivingItem = (giving: RecurringGiving, formatters: Formatters): RecurringGivingItem => ({
  id: giving.id,
  title: giving.category_name?.trim() || 'General Giving',
  amountText: formatters.formatCurrency(giving.amount),
  frequencyLabel: humanize(giving.frequency),
  nextDateText: `Next: ${formatters.formatDate(giving.next_payment_date, DATE_PATTERN)}`,
  status: giving.status,
  statusLabel: giving.status === 'active' ? 'Active' : 'Paused',
});
