/**
 * Domain types for SubDash.
 * Plain data shared by the web app and the API server.
 */

export const BILLING_CYCLES = ['monthly', 'quarterly', 'semiannual', 'yearly', 'lifetime'] as const;

export type BillingCycle = (typeof BILLING_CYCLES)[number];

/** Months covered by one payment; lifetime has no recurring share */
export const CYCLE_MONTHS: Record<BillingCycle, number> = {
  monthly: 1,
  quarterly: 3,
  semiannual: 6,
  yearly: 12,
  lifetime: 0,
};

/** Persisted subscription record (one CSV row) */
export interface Subscription {
  id: string;
  name: string;
  vendor: string;
  category: string;
  cycle: BillingCycle;
  amount: number;              // in `currency`
  currency: string;            // ISO 4217 code
  nextPayment: string;         // YYYY-MM-DD
  autoRenew: boolean;
}

export type SubscriptionInput = Omit<Subscription, 'id'>;

/** Subscription plus the figures derived on load */
export interface EnrichedSubscription extends Subscription {
  daysRemaining: number;       // negative when the payment date has passed
  amountInBase: number;
  monthlyCost: number;         // in base currency
}

/** YYYY-MM-DD string */
export type DateKey = string;

/** YYYY-MM string */
export type Month = string;

/** Units of base currency per one unit of the keyed currency */
export type RateTable = Record<string, number>;

export interface DashboardKpis {
  totalCount: number;
  activeCount: number;
  monthlyTotal: number;
  yearlyEstimate: number;
  warningCount: number;
}

export interface CategoryTotal {
  category: string;
  monthlyCost: number;
  count: number;
  share: number;               // percent of the monthly total, one decimal
}

export interface CycleTotal {
  cycle: BillingCycle;
  count: number;
  share: number;               // percent of all subscriptions, one decimal
  monthlyCost: number;
}

export interface TimelineEntry {
  id: string;
  name: string;
  date: DateKey;
  daysRemaining: number;
  amount: number;
  currency: string;
  autoRenew: boolean;
}

export interface CostFlowNode {
  name: string;
  kind: 'total' | 'category' | 'subscription';
}

export interface CostFlowLink {
  source: number;
  target: number;
  value: number;
}

export interface CostFlow {
  nodes: CostFlowNode[];
  links: CostFlowLink[];
}

export type SortKey = 'days-asc' | 'days-desc' | 'cost-asc' | 'cost-desc' | 'name';

export interface SubscriptionFilter {
  category?: string | null;
  autoRenew?: boolean | null;
}

/** One monthly spending snapshot */
export interface HistorySnapshot {
  date: DateKey;
  subscriptionCount: number;
  monthlyTotal: number;
  yearlyEstimate: number;
  categoryTotals: Record<string, number>;
}

/** One category's monthly cost in a snapshot */
export interface CategoryTrendPoint {
  date: DateKey;
  monthlyCost: number;
}

export const IMPORT_MODES = ['replace', 'append', 'merge'] as const;

export type ImportMode = (typeof IMPORT_MODES)[number];

/** Categories offered when no categories file is present */
export const DEFAULT_CATEGORIES = ['AI', 'Video', 'Music', 'Software', 'System', 'Other'];
