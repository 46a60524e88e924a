import { describe, expect, it } from 'vitest';
import { createFormatters, formatDate, humanize } from './format';

describe('formatDate', () => {
  it('formats server timestamps', () => {
    expect(formatDate('2024-03-05T10:30:00')).toBe('Mar 05, 2024');
    expect(formatDate('2024-03-05T10:30:00', 'MMM dd, yyyy HH:mm')).toBe('Mar 05, 2024 10:30');
    expect(formatDate('2024-12-25')).toBe('Dec 25, 2024');
  });

  it('returns unparseable input verbatim', () => {
    expect(formatDate('not-a-date')).toBe('not-a-date');
    expect(formatDate('')).toBe('');
    expect(formatDate('2024-13-45')).toBe('2024-13-45');
  });
});

describe('createFormatters', () => {
  it('formats amounts in the configured currency', () => {
    const formatters = createFormatters({ locale: 'en-US', currency: 'USD' });
    expect(formatters.formatCurrency(500)).toBe('$500.00');
    expect(formatters.formatCurrency(1234.5)).toBe('$1,234.50');
  });

  it('shows zero for non-finite amounts', () => {
    const formatters = createFormatters({ locale: 'en-US', currency: 'USD' });
    expect(formatters.formatCurrency(Number.NaN)).toBe('$0.00');
  });
});

describe('humanize', () => {
  it('turns enum values into labels', () => {
    expect(humanize('bi_weekly')).toBe('Bi weekly');
    expect(humanize('completed')).toBe('Completed');
  });
});
