/**
 * Pure domain computations: data in, data out.
 * Shared by the web app and the API server.
 */
import { convertToBase, roundHalfUp } from './currency';
import {
  BILLING_CYCLES,
  CYCLE_MONTHS,
  type BillingCycle,
  type CategoryTotal,
  type CostFlow,
  type CostFlowNode,
  type CycleTotal,
  type DashboardKpis,
  type DateKey,
  type EnrichedSubscription,
  type HistorySnapshot,
  type Month,
  type RateTable,
  type SortKey,
  type Subscription,
  type SubscriptionFilter,
  type TimelineEntry,
} from './types';

const MS_PER_DAY = 86_400_000;

const CYCLE_ALIASES: Record<string, BillingCycle> = {
  monthly: 'monthly', month: 'monthly', mo: 'monthly', m: 'monthly',
  quarterly: 'quarterly', quarter: 'quarterly', q: 'quarterly',
  semiannual: 'semiannual', 'semi-annual': 'semiannual', 'half-yearly': 'semiannual', halfyear: 'semiannual',
  yearly: 'yearly', annual: 'yearly', annually: 'yearly', year: 'yearly', y: 'yearly',
  lifetime: 'lifetime', once: 'lifetime', 'one-time': 'lifetime',
};

/** Map a free-text billing cycle onto the canonical union; null when unrecognised */
export function normalizeCycle(raw: string): BillingCycle | null {
  return CYCLE_ALIASES[raw.trim().toLowerCase()] ?? null;
}

// --- Dates ---

/** Split a YYYY-MM-DD key, rejecting impossible dates such as 2025-02-30 */
export function parseDateKey(key: string): { year: number; month: number; day: number } | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(key);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

/** Local calendar date as YYYY-MM-DD */
export function toDateKey(date: Date): DateKey {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: DateKey, to: DateKey): number {
  const a = parseDateKey(from);
  const b = parseDateKey(to);
  if (!a || !b) return NaN;
  const diff = Date.UTC(b.year, b.month - 1, b.day) - Date.UTC(a.year, a.month - 1, a.day);
  return Math.round(diff / MS_PER_DAY);
}

export function daysUntil(date: DateKey, today: Date = new Date()): number {
  return daysBetween(toDateKey(today), date);
}

/**
 * Shift a date by whole months. The day is clamped to the target month's length,
 * so 2025-01-31 + 1 month is 2025-02-28.
 */
export function addMonths(key: DateKey, months: number): DateKey {
  const parts = parseDateKey(key);
  if (!parts) return key;
  const index = parts.month - 1 + months;
  const year = parts.year + Math.floor(index / 12);
  const month = ((index % 12) + 12) % 12;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  const day = Math.min(parts.day, lastDay);
  return `${year}-${String(month + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Roll lapsed auto-renewing subscriptions forward by whole billing cycles
 * until the next payment is today or later. Lifetime purchases never move.
 */
export function applyAutoRenewals(
  subscriptions: Subscription[],
  today: Date = new Date(),
): { subscriptions: Subscription[]; changed: boolean } {
  const todayKey = toDateKey(today);
  let changed = false;

  const next = subscriptions.map((sub) => {
    const step = CYCLE_MONTHS[sub.cycle];
    if (!sub.autoRenew || step === 0) return sub;
    if (!parseDateKey(sub.nextPayment) || sub.nextPayment >= todayKey) return sub;

    // Offsets are taken from the original date so month-end clamping does not drift
    let periods = 1;
    let candidate = addMonths(sub.nextPayment, step);
    while (candidate < todayKey) {
      periods++;
      candidate = addMonths(sub.nextPayment, step * periods);
    }
    changed = true;
    return { ...sub, nextPayment: candidate };
  });

  return { subscriptions: next, changed };
}

// --- Cost normalisation ---

/** Equivalent monthly figure for one payment of `amount` */
export function monthlyCost(amount: number, cycle: BillingCycle): number {
  const months = CYCLE_MONTHS[cycle];
  if (months === 0) return 0;
  return amount / months;
}

export function enrichSubscription(
  sub: Subscription,
  rates: RateTable,
  baseCurrency: string,
  today: Date = new Date(),
): EnrichedSubscription {
  const amountInBase = convertToBase(sub.amount, sub.currency, rates, baseCurrency);
  return {
    ...sub,
    daysRemaining: daysUntil(sub.nextPayment, today),
    amountInBase,
    monthlyCost: monthlyCost(amountInBase, sub.cycle),
  };
}

export function enrichSubscriptions(
  subs: Subscription[],
  rates: RateTable,
  baseCurrency: string,
  today: Date = new Date(),
): EnrichedSubscription[] {
  return subs.map((s) => enrichSubscription(s, rates, baseCurrency, today));
}

function sumMonthly(subs: EnrichedSubscription[]): number {
  return subs.reduce((sum, s) => sum + s.monthlyCost, 0);
}

function percent(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return roundHalfUp((part / whole) * 100, 1);
}

// --- Dashboard ---

/** Auto-renewing subscriptions that will charge within `days` */
export function renewalWarnings(subs: EnrichedSubscription[], days: number): EnrichedSubscription[] {
  return upcomingRenewals(subs, days, { autoRenewOnly: true });
}

export function dashboardKpis(subs: EnrichedSubscription[], warningDays: number): DashboardKpis {
  const monthlyTotal = sumMonthly(subs);
  return {
    totalCount: subs.length,
    activeCount: subs.filter((s) => s.daysRemaining >= 0).length,
    monthlyTotal,
    yearlyEstimate: monthlyTotal * 12,
    warningCount: renewalWarnings(subs, warningDays).length,
  };
}

/** Payments due between today and `days` from now, soonest first */
export function upcomingRenewals(
  subs: EnrichedSubscription[],
  days: number,
  options: { autoRenewOnly?: boolean } = {},
): EnrichedSubscription[] {
  return subs
    .filter((s) => s.daysRemaining >= 0 && s.daysRemaining <= days)
    .filter((s) => !options.autoRenewOnly || s.autoRenew)
    .sort((a, b) => a.daysRemaining - b.daysRemaining);
}

/** Monthly spend per category, most expensive first */
export function categoryBreakdown(subs: EnrichedSubscription[]): CategoryTotal[] {
  const map = new Map<string, { monthlyCost: number; count: number }>();
  for (const s of subs) {
    const entry = map.get(s.category) ?? { monthlyCost: 0, count: 0 };
    entry.monthlyCost += s.monthlyCost;
    entry.count += 1;
    map.set(s.category, entry);
  }

  const total = sumMonthly(subs);
  return Array.from(map.entries())
    .map(([category, { monthlyCost: cost, count }]) => ({
      category,
      monthlyCost: cost,
      count,
      share: percent(cost, total),
    }))
    .sort((a, b) => b.monthlyCost - a.monthlyCost);
}

/** Subscription count per billing cycle, most common first */
export function cycleDistribution(subs: EnrichedSubscription[]): CycleTotal[] {
  const totals: CycleTotal[] = BILLING_CYCLES.map((cycle) => {
    const members = subs.filter((s) => s.cycle === cycle);
    return {
      cycle,
      count: members.length,
      share: percent(members.length, subs.length),
      monthlyCost: sumMonthly(members),
    };
  });
  return totals.filter((t) => t.count > 0).sort((a, b) => b.count - a.count);
}

export function topByMonthlyCost(subs: EnrichedSubscription[], n = 3): EnrichedSubscription[] {
  return [...subs].sort((a, b) => b.monthlyCost - a.monthlyCost).slice(0, n);
}

// --- Table ---

export function filterSubscriptions<T extends Subscription>(subs: T[], filter: SubscriptionFilter): T[] {
  return subs.filter((s) => {
    if (filter.category && s.category !== filter.category) return false;
    if (filter.autoRenew !== undefined && filter.autoRenew !== null && s.autoRenew !== filter.autoRenew) {
      return false;
    }
    return true;
  });
}

export function sortSubscriptions(subs: EnrichedSubscription[], key: SortKey): EnrichedSubscription[] {
  const sorted = [...subs];
  switch (key) {
    case 'days-asc':
      return sorted.sort((a, b) => a.daysRemaining - b.daysRemaining);
    case 'days-desc':
      return sorted.sort((a, b) => b.daysRemaining - a.daysRemaining);
    case 'cost-asc':
      return sorted.sort((a, b) => a.monthlyCost - b.monthlyCost);
    case 'cost-desc':
      return sorted.sort((a, b) => b.monthlyCost - a.monthlyCost);
    case 'name':
      return sorted.sort((a, b) => a.name.localeCompare(b.name));
  }
}

// --- Analytics ---

/** Future payments within the horizon, in date order */
export function paymentTimeline(subs: EnrichedSubscription[], horizonDays = 90): TimelineEntry[] {
  return subs
    .filter((s) => s.daysRemaining >= 0 && s.daysRemaining <= horizonDays)
    .sort((a, b) => a.nextPayment.localeCompare(b.nextPayment) || a.name.localeCompare(b.name))
    .map((s) => ({
      id: s.id,
      name: s.name,
      date: s.nextPayment,
      daysRemaining: s.daysRemaining,
      amount: s.amount,
      currency: s.currency,
      autoRenew: s.autoRenew,
    }));
}

/**
 * Sankey graph of monthly spend: total → category → subscription.
 * Subscriptions without a recurring cost (lifetime) are left out.
 */
export function costFlow(subs: EnrichedSubscription[]): CostFlow {
  const paying = subs.filter((s) => s.monthlyCost > 0);
  if (paying.length === 0) return { nodes: [], links: [] };

  const nodes: CostFlowNode[] = [{ name: 'Total', kind: 'total' }];
  const links: CostFlow['links'] = [];

  for (const cat of categoryBreakdown(paying)) {
    const catIndex = nodes.length;
    nodes.push({ name: cat.category, kind: 'category' });
    links.push({ source: 0, target: catIndex, value: cat.monthlyCost });

    for (const s of paying.filter((p) => p.category === cat.category)) {
      links.push({ source: catIndex, target: nodes.length, value: s.monthlyCost });
      nodes.push({ name: s.name, kind: 'subscription' });
    }
  }

  return { nodes, links };
}

/** Snapshot of the current spend for the month containing `today` */
export function buildSnapshot(subs: EnrichedSubscription[], today: Date = new Date()): HistorySnapshot {
  const monthlyTotal = sumMonthly(subs);
  const categoryTotals: Record<string, number> = {};
  for (const cat of categoryBreakdown(subs)) {
    categoryTotals[cat.category] = roundHalfUp(cat.monthlyCost);
  }
  return {
    date: toDateKey(today),
    subscriptionCount: subs.length,
    monthlyTotal: roundHalfUp(monthlyTotal),
    yearlyEstimate: roundHalfUp(monthlyTotal * 12),
    categoryTotals,
  };
}

/**
 * Month-over-month change of the monthly total, in percent.
 * Null with fewer than two snapshots or a zero previous total.
 */
export function growthRate(snapshots: HistorySnapshot[]): number | null {
  if (snapshots.length < 2) return null;
  const ordered = [...snapshots].sort((a, b) => a.date.localeCompare(b.date));
  const current = ordered[ordered.length - 1].monthlyTotal;
  const previous = ordered[ordered.length - 2].monthlyTotal;
  if (previous === 0) return null;
  return roundHalfUp(((current - previous) / previous) * 100, 2);
}

// --- Months ---

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  return `${y}-${m}`;
}
