/**
 * CSV codec for the subscriptions file.
 * Files are written as UTF-8 with a byte-order mark so spreadsheet programs pick the right encoding.
 */
import type { Subscription } from './types';
import { normalizeHeader, recordToInput } from './validation';

export const BOM = '\uFEFF';

export const SUBSCRIPTION_COLUMNS = [
  'id',
  'name',
  'vendor',
  'category',
  'cycle',
  'amount',
  'currency',
  'next_payment',
  'auto_renew',
] as const;

export const REQUIRED_COLUMNS = ['name', 'category', 'cycle', 'amount', 'next_payment', 'auto_renew'];

export type CsvCell = string | number | boolean;

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

/**
 * Parse CSV text into rows (handles quoted fields, including quoted line breaks)
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  const endRow = () => {
    row.push(current.trim());
    if (row.some((cell) => cell !== '')) rows.push(row);
    row = [];
    current = '';
  };

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (char === '"') {
      if (inQuotes && source[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      row.push(current.trim());
      current = '';
    } else if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && source[i + 1] === '\n') i++;
      endRow();
    } else {
      current += char;
    }
  }
  if (current !== '' || row.length > 0) endRow();

  return rows;
}

function escapeCell(value: CsvCell): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function serializeCsv(header: readonly string[], rows: CsvCell[][]): string {
  const lines = [header.map(escapeCell).join(','), ...rows.map((r) => r.map(escapeCell).join(','))];
  return `${BOM}${lines.join('\n')}\n`;
}

/** First row as normalised headers, following rows keyed by them */
export function rowsToRecords(rows: string[][]): { headers: string[]; records: Record<string, string>[] } {
  if (rows.length === 0) return { headers: [], records: [] };
  const headers = rows[0].map(normalizeHeader);
  const records = rows.slice(1).map((row) => {
    const record: Record<string, string> = {};
    headers.forEach((h, i) => {
      record[h] = row[i] ?? '';
    });
    return record;
  });
  return { headers, records };
}

export function missingColumns(headers: string[]): string[] {
  return REQUIRED_COLUMNS.filter((col) => !headers.includes(col));
}

export interface RowError {
  line: number;                // 1-based row, the header is row 1
  message: string;
}

export type CsvLoadResult =
  | { ok: true; subscriptions: Subscription[]; errors: RowError[]; idsAssigned: boolean }
  | { ok: false; error: string };

/**
 * Decode the subscriptions file. Invalid rows are reported and skipped;
 * a missing required column fails the whole file.
 */
export function subscriptionsFromCsv(text: string, baseCurrency: string): CsvLoadResult {
  const rows = parseCsv(text);
  if (rows.length === 0) return { ok: true, subscriptions: [], errors: [], idsAssigned: false };

  const { headers, records } = rowsToRecords(rows);
  const missing = missingColumns(headers);
  if (missing.length > 0) {
    return { ok: false, error: `Missing required columns: ${missing.join(', ')}` };
  }

  const subscriptions: Subscription[] = [];
  const errors: RowError[] = [];
  let idsAssigned = false;
  records.forEach((record, index) => {
    const result = recordToInput(record, baseCurrency);
    if (!result.ok) {
      errors.push({ line: index + 2, message: result.error });
      return;
    }
    const { id, ...input } = result.value;
    if (!id) idsAssigned = true;
    subscriptions.push({ id: id ?? generateId(), ...input });
  });

  // Rows without an id get a fresh one; callers must save it or it changes on the next read
  return { ok: true, subscriptions, errors, idsAssigned };
}

export function subscriptionsToCsv(subscriptions: Subscription[]): string {
  return serializeCsv(
    SUBSCRIPTION_COLUMNS,
    subscriptions.map((s) => [
      s.id,
      s.name,
      s.vendor,
      s.category,
      s.cycle,
      s.amount,
      s.currency,
      s.nextPayment,
      s.autoRenew ? 'TRUE' : 'FALSE',
    ]),
  );
}
