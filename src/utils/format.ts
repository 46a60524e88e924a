import { format, isValid, parseISO } from 'date-fns';

export const DATE_PATTERN = 'MMM dd, yyyy';

export interface Formatters {
  formatCurrency(amount: number): string;
  /** Returns the input untouched when it is not a parseable timestamp. */
  formatDate(raw: string, pattern?: string): string;
}

export const formatDate = (raw: string, pattern: string = DATE_PATTERN): string => {
  const parsed = parseISO(raw);
  if (!isValid(parsed)) {
    return raw;
  }

  try {
    return format(parsed, pattern);
  } catch (error) {
    console.warn(`Could not format date "${raw}":`, error);
    return raw;
  }
};

export const createFormatters = ({ locale, currency }: { locale: string; currency: string }): Formatters => {
  const currencyFormat = new Intl.NumberFormat(locale, { style: 'currency', currency });

  return {
    formatCurrency: (amount) => currencyFormat.format(Number.isFinite(amount) ? amount : 0),
    formatDate,
  };
};

// Server enum values arrive snake_case ("bi_weekly")
export const humanize = (value: string): string => {
  const spaced = value.replace(/_/g, ' ').trim();
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
};
