import Encoding from 'encoding-japanese';
import * as XLSX from 'xlsx';
import { parseCsv, rowsToRecords } from '../domain/csv';
import { normalizeHeader } from '../domain/validation';

export type ImportFormat = 'csv' | 'xlsx' | 'json';

export const PREVIEW_ROWS = 5;

export interface ParsedImport {
  format: ImportFormat;
  headers: string[];
  records: Record<string, unknown>[];
  preview: Record<string, string>[];
}

export type ParseImportResult = { ok: true; data: ParsedImport } | { ok: false; error: string };

export type FileBytes = ArrayBuffer | Uint8Array;

function toBytes(data: FileBytes): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/**
 * Decode file content with UTF-8 first, then Shift_JIS.
 * Spreadsheet programs on some locales still save CSV in legacy code pages.
 */
export function decodeFileContent(data: FileBytes): string {
  const bytes = toBytes(data);

  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    if (!text.includes('\uFFFD')) return text;
  } catch {
    // Not valid UTF-8, try Shift_JIS
  }

  const unicode = Encoding.convert(bytes, { to: 'UNICODE', from: 'SJIS' });
  return Encoding.codeToString(unicode);
}

export function detectFormat(filename: string): ImportFormat | null {
  const ext = filename.toLowerCase().split('.').pop();
  if (ext === 'csv' || ext === 'txt') return 'csv';
  if (ext === 'xlsx' || ext === 'xls') return 'xlsx';
  if (ext === 'json') return 'json';
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Accepts a bare array of objects or `{ "subscriptions": [...] }` */
function recordsFromJson(text: string): Record<string, unknown>[] | string {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (err) {
    return `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`;
  }
  const list = isRecord(body) ? body.subscriptions : body;
  if (!Array.isArray(list)) return 'JSON must be an array of subscriptions';
  if (!list.every(isRecord)) return 'Every JSON entry must be an object';
  return list;
}

function recordsFromWorkbook(data: FileBytes): Record<string, unknown>[] | string {
  const workbook = XLSX.read(toBytes(data), { type: 'array' });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return 'Workbook has no sheets';
  // raw: false renders date cells as text so they validate like CSV input
  return XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    raw: false,
    dateNF: 'yyyy-mm-dd',
    defval: '',
  });
}

function headersOf(records: Record<string, unknown>[]): string[] {
  const headers = new Set<string>();
  records.forEach((r) => Object.keys(r).forEach((k) => headers.add(normalizeHeader(k))));
  return Array.from(headers);
}

/**
 * Turn an uploaded file into loosely typed records for the import endpoint.
 * Validation happens on the server; this only decodes and previews.
 */
export function parseImportFile(filename: string, data: FileBytes): ParseImportResult {
  const format = detectFormat(filename);
  if (!format) return { ok: false, error: 'Unsupported file type (use .csv, .xlsx or .json)' };

  let records: Record<string, unknown>[];
  let headers: string[];

  if (format === 'csv') {
    const parsed = rowsToRecords(parseCsv(decodeFileContent(data)));
    records = parsed.records;
    headers = parsed.headers;
  } else {
    const result = format === 'json' ? recordsFromJson(decodeFileContent(data)) : recordsFromWorkbook(data);
    if (typeof result === 'string') return { ok: false, error: result };
    records = result;
    headers = headersOf(records);
  }

  if (records.length === 0) return { ok: false, error: 'No rows found in file' };

  const preview = records.slice(0, PREVIEW_ROWS).map((record) => {
    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(record)) row[normalizeHeader(key)] = cellText(value);
    return row;
  });

  return { ok: true, data: { format, headers, records, preview } };
}
