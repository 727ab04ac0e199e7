import type {
  BillingCycle,
  CategoryTotal,
  CategoryTrendPoint,
  CostFlow,
  CycleTotal,
  DashboardKpis,
  EnrichedSubscription,
  HistorySnapshot,
  ImportMode,
  RateTable,
  SortKey,
  SubscriptionInput,
  TimelineEntry,
} from '../domain/types';

const API_BASE = '/api';

export type RateStatusKind = 'success' | 'cached' | 'updating' | 'error' | 'fallback' | 'unknown';

export interface RateStatus {
  status: RateStatusKind;
  message: string;
  lastUpdated: string | null;
  source: string | null;
}

export interface ApiRates {
  base: string;
  rates: RateTable;
  status: RateStatus;
}

export interface ApiOptions {
  categories: string[];
  cycles: BillingCycle[];
  currencies: string[];
  baseCurrency: string;
  warningDays: number;
  reminderDays: number;
  importModes: ImportMode[];
}

export interface ApiSummary {
  baseCurrency: string;
  warningDays: number;
  kpis: DashboardKpis;
  upcoming: EnrichedSubscription[];
  categories: CategoryTotal[];
  cycles: CycleTotal[];
  top: EnrichedSubscription[];
  timeline: TimelineEntry[];
  costFlow: CostFlow;
}

export interface ApiHistory {
  snapshots: HistorySnapshot[];
  growthRate: number | null;
  categoryTrend?: CategoryTrendPoint[];     // only when a category was asked for
}

export interface ImportResult {
  imported: number;
  total: number;
}

export interface ReminderRequest {
  days?: number;
  force?: boolean;
  dryRun?: boolean;
  email?: string;
}

export interface ReminderResult {
  success: boolean;
  message: string;
  sent: string[];
  skipped: string[];
  preview?: string;
}

export interface ListQuery {
  category?: string;
  autoRenew?: boolean;
  sort?: SortKey;
}

export type ExportFormat = 'csv' | 'xlsx';

export interface ExportFile {
  blob: Blob;
  filename: string;
}

/** Non-2xx response; `details` carries the server's field or row errors when present */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly details: unknown = null,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

async function toApiError(response: Response, fallback: string): Promise<ApiError> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
      return new ApiError(body.error, response.status, 'details' in body ? body.details : null);
    }
  } catch {
    // Non-JSON error page
  }
  return new ApiError(fallback, response.status);
}

/** Row errors from a rejected import, as "row 2: Category is required" */
export function rowErrors(error: unknown): string[] {
  if (!(error instanceof ApiError) || !Array.isArray(error.details)) return [];
  return error.details.flatMap((d: unknown) => {
    if (typeof d !== 'object' || d === null || !('row' in d) || !('error' in d)) return [];
    return [`row ${String(d.row)}: ${String(d.error)}`];
  });
}

async function request<T>(path: string, fallback: string, init?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, init);
  if (!response.ok) throw await toApiError(response, fallback);
  return response.json();
}

function jsonBody(method: string, data: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(data),
  };
}

// --- Subscriptions ---

export async function getSubscriptions(query: ListQuery = {}): Promise<EnrichedSubscription[]> {
  const params = new URLSearchParams();
  if (query.category) params.set('category', query.category);
  if (query.autoRenew !== undefined) params.set('autoRenew', String(query.autoRenew));
  if (query.sort) params.set('sort', query.sort);
  const search = params.toString();
  return request(`/subscriptions${search ? `?${search}` : ''}`, 'Failed to fetch subscriptions');
}

export async function createSubscription(data: SubscriptionInput): Promise<EnrichedSubscription> {
  return request('/subscriptions', 'Failed to create subscription', jsonBody('POST', data));
}

export async function updateSubscription(id: string, data: Partial<SubscriptionInput>): Promise<EnrichedSubscription> {
  return request(`/subscriptions/${encodeURIComponent(id)}`, 'Failed to update subscription', jsonBody('PUT', data));
}

export async function deleteSubscription(id: string): Promise<void> {
  await request<{ ok: boolean }>(`/subscriptions/${encodeURIComponent(id)}`, 'Failed to delete subscription', {
    method: 'DELETE',
  });
}

export async function importSubscriptions(
  records: Record<string, unknown>[],
  mode: ImportMode,
): Promise<ImportResult> {
  return request('/subscriptions/import', 'Failed to import subscriptions', jsonBody('POST', { mode, records }));
}

// --- Dashboard ---

export async function getOptions(): Promise<ApiOptions> {
  return request('/options', 'Failed to fetch options');
}

export async function getSummary(): Promise<ApiSummary> {
  return request('/summary', 'Failed to fetch summary');
}

// --- Rates ---

export async function getRates(): Promise<ApiRates> {
  return request('/rates', 'Failed to fetch rates');
}

export async function refreshRates(): Promise<ApiRates> {
  return request('/rates/refresh', 'Failed to refresh rates', { method: 'POST' });
}

// --- History ---

export async function getHistory(months = 12, category?: string): Promise<ApiHistory> {
  const params = new URLSearchParams({ months: String(months) });
  if (category) params.set('category', category);
  return request(`/history?${params.toString()}`, 'Failed to fetch history');
}

export async function recordSnapshot(): Promise<HistorySnapshot> {
  return request('/history/snapshot', 'Failed to record snapshot', { method: 'POST' });
}

// --- Reminders ---

export async function sendReminders(data: ReminderRequest): Promise<ReminderResult> {
  return request('/reminders', 'Failed to send reminders', jsonBody('POST', data));
}

// --- Export ---

const FILENAME_PATTERN = /filename="([^"]+)"/;

export async function exportSubscriptions(format: ExportFormat): Promise<ExportFile> {
  const response = await fetch(`${API_BASE}/export?format=${format}`);
  if (!response.ok) throw await toApiError(response, 'Failed to export subscriptions');
  const disposition = response.headers.get('Content-Disposition') ?? '';
  const filename = FILENAME_PATTERN.exec(disposition)?.[1] ?? `subscriptions.${format}`;
  return { blob: await response.blob(), filename };
}
