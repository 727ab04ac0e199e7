import type { BillingCycle } from '../domain/types';

export const CYCLE_LABELS: Record<BillingCycle, string> = {
  monthly: 'Monthly',
  quarterly: 'Quarterly',
  semiannual: 'Every 6 months',
  yearly: 'Yearly',
  lifetime: 'Lifetime',
};

/** "today", "tomorrow", "in 5 days", "3 days ago" */
export function describeDays(daysRemaining: number): string {
  if (daysRemaining === 0) return 'today';
  if (daysRemaining === 1) return 'tomorrow';
  if (daysRemaining > 1) return `in ${daysRemaining} days`;
  const ago = -daysRemaining;
  return ago === 1 ? '1 day ago' : `${ago} days ago`;
}

const dateFmt = new Intl.DateTimeFormat('en-GB', { day: 'numeric', month: 'short', year: 'numeric' });

/** 2025-03-04 → 4 Mar 2025 */
export function formatDateKey(key: string): string {
  const [year, month, day] = key.split('-').map(Number);
  if (!year || !month || !day) return key;
  return dateFmt.format(new Date(year, month - 1, day));
}

const monthFmt = new Intl.DateTimeFormat('en-GB', { month: 'short', year: '2-digit' });

/** 2025-03-01 → Mar 25 */
export function formatMonth(key: string): string {
  const [year, month] = key.split('-').map(Number);
  if (!year || !month) return key;
  return monthFmt.format(new Date(year, month - 1, 1));
}
