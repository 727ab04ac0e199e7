import * as XLSX from 'xlsx';
import { type CsvCell, serializeCsv } from '../../src/domain/csv.js';
import { roundHalfUp } from '../../src/domain/currency.js';
import type { EnrichedSubscription } from '../../src/domain/types.js';

export const EXPORT_COLUMNS = [
  'name',
  'vendor',
  'category',
  'cycle',
  'amount',
  'currency',
  'monthly_cost',
  'next_payment',
  'days_remaining',
  'auto_renew',
] as const;

export type ExportFormat = 'csv' | 'xlsx';

export const SHEET_NAME = 'Subscriptions';

function exportRows(subs: EnrichedSubscription[]): CsvCell[][] {
  return subs.map((s) => [
    s.name,
    s.vendor,
    s.category,
    s.cycle,
    s.amount,
    s.currency,
    roundHalfUp(s.monthlyCost),
    s.nextPayment,
    s.daysRemaining,
    s.autoRenew ? 'TRUE' : 'FALSE',
  ]);
}

/** subscriptions_20250301.csv */
export function exportFilename(format: ExportFormat, now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `subscriptions_${y}${m}${d}.${format}`;
}

export function exportCsv(subs: EnrichedSubscription[]): string {
  return serializeCsv(EXPORT_COLUMNS, exportRows(subs));
}

export function exportXlsx(subs: EnrichedSubscription[]): Buffer {
  const worksheet = XLSX.utils.aoa_to_sheet([[...EXPORT_COLUMNS], ...exportRows(subs)]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, SHEET_NAME);
  const data: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(data)) throw new Error('Spreadsheet writer did not return a buffer');
  return data;
}

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};
