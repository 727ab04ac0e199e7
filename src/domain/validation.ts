/**
 * Input validation for subscription records.
 * Every entry point (form, HTTP body, CSV row, spreadsheet row, JSON backup)
 * goes through the same zod schema.
 */
import { z } from 'zod';
import { normalizeCycle, parseDateKey } from './computations';
import { isSupportedCurrency, roundHalfUp } from './currency';
import type { SubscriptionInput } from './types';

export const MAX_NAME_LENGTH = 100;
export const MAX_AMOUNT = 1_000_000;

export const SubscriptionInputSchema = z.object({
  name: z
    .string({ required_error: 'Name is required' })
    .trim()
    .min(1, 'Name is required')
    .max(MAX_NAME_LENGTH, `Name is too long (max ${MAX_NAME_LENGTH} characters)`),
  vendor: z.string().trim().max(255).default(''),
  category: z.string({ required_error: 'Category is required' }).trim().min(1, 'Category is required').max(50),
  cycle: z.string({ required_error: 'Billing cycle is required' }).transform((value, ctx) => {
    const cycle = normalizeCycle(value);
    if (!cycle) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown billing cycle: ${value}` });
      return z.NEVER;
    }
    return cycle;
  }),
  amount: z.coerce
    .number({ required_error: 'Amount is required', invalid_type_error: 'Amount must be a number' })
    .max(MAX_AMOUNT, 'Amount is out of range')
    .transform((v) => roundHalfUp(v))
    // Checked after rounding so 0.001 cannot be stored as 0
    .pipe(z.number().gt(0, 'Amount must be greater than 0')),
  currency: z
    .string()
    .trim()
    .toUpperCase()
    .refine(isSupportedCurrency, (value) => ({ message: `Unsupported currency: ${value}` })),
  nextPayment: z
    .string({ required_error: 'Next payment date is required' })
    .trim()
    .refine((v) => parseDateKey(v) !== null, 'Invalid date, use YYYY-MM-DD'),
  autoRenew: z.boolean().default(false),
});

export const SubscriptionPatchSchema = SubscriptionInputSchema.partial();

export type SubscriptionPatch = z.output<typeof SubscriptionPatchSchema>;

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; field: string | null };

function firstIssue(error: z.ZodError): { error: string; field: string | null } {
  const issue = error.issues[0];
  const field = issue?.path.length ? String(issue.path[0]) : null;
  return { error: issue?.message ?? 'Invalid input', field };
}

export function validateSubscriptionInput(input: unknown): ValidationResult<SubscriptionInput> {
  const result = SubscriptionInputSchema.safeParse(input);
  if (!result.success) return { ok: false, ...firstIssue(result.error) };
  const value: SubscriptionInput = result.data;
  return { ok: true, value };
}

export function validateSubscriptionPatch(input: unknown): ValidationResult<SubscriptionPatch> {
  const result = SubscriptionPatchSchema.safeParse(input);
  if (!result.success) return { ok: false, ...firstIssue(result.error) };
  return { ok: true, value: result.data };
}

const TRUE_VALUES = new Set(['TRUE', 'T', 'YES', 'Y', '1']);

/** Lenient boolean: TRUE/T/YES/Y/1 in any case; everything else is false */
export function parseBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (value === null || value === undefined) return false;
  return TRUE_VALUES.has(String(value).trim().toUpperCase());
}

export function sanitizeString(value: unknown, maxLength = 255): string {
  const text = typeof value === 'string' ? value : String(value ?? '');
  return text.trim().slice(0, maxLength);
}

// --- Loose records (CSV rows, spreadsheet rows, JSON objects) ---

const HEADER_ALIASES: Record<string, string> = {
  nextpayment: 'next_payment',
  next_payment_date: 'next_payment',
  autorenew: 'auto_renew',
  billing_cycle: 'cycle',
  service: 'category',
  supplier: 'vendor',
  price: 'amount',
};

/** `Next Payment` → `next_payment`, `autoRenew` → `auto_renew` */
export function normalizeHeader(header: string): string {
  const key = header.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return HEADER_ALIASES[key] ?? key;
}

const EMPTY_MARKERS = new Set(['', 'nan', 'none', 'null', 'undefined']);

function cleanValue(value: unknown): string | number | boolean | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  const text = String(value).trim();
  return EMPTY_MARKERS.has(text.toLowerCase()) ? undefined : text;
}

export type ImportedRecord = SubscriptionInput & { id?: string };

/**
 * Turn a loosely typed row into a validated subscription input.
 * Headers are matched case-insensitively; currency defaults to the base currency.
 */
export function recordToInput(
  record: Record<string, unknown>,
  baseCurrency: string,
): ValidationResult<ImportedRecord> {
  const row: Record<string, string | number | boolean | undefined> = {};
  for (const [key, value] of Object.entries(record)) {
    row[normalizeHeader(key)] = cleanValue(value);
  }

  const amount = typeof row.amount === 'string' ? row.amount.replace(/,/g, '') : row.amount;
  const result = validateSubscriptionInput({
    name: row.name === undefined ? undefined : String(row.name),
    vendor: row.vendor === undefined ? '' : String(row.vendor),
    category: row.category === undefined ? undefined : String(row.category),
    cycle: row.cycle === undefined ? undefined : String(row.cycle),
    amount,
    currency: row.currency === undefined ? baseCurrency : String(row.currency),
    nextPayment: row.next_payment === undefined ? undefined : String(row.next_payment),
    autoRenew: parseBoolean(row.auto_renew),
  });
  if (!result.ok) return result;

  const id = typeof row.id === 'string' && row.id ? row.id : undefined;
  return { ok: true, value: id ? { ...result.value, id } : result.value };
}
