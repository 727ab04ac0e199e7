import fs from 'fs';
import path from 'path';
import { applyAutoRenewals } from '../../src/domain/computations.js';
import { generateId, parseCsv, rowsToRecords, subscriptionsFromCsv, subscriptionsToCsv } from '../../src/domain/csv.js';
import { DEFAULT_CATEGORIES, type ImportMode, type Subscription, type SubscriptionInput } from '../../src/domain/types.js';
import type { ImportedRecord, SubscriptionPatch } from '../../src/domain/validation.js';

export interface ImportResult {
  imported: number;
  total: number;
}

/**
 * Subscriptions live in a single CSV file. Every read goes to disk so edits
 * made in a spreadsheet program show up without a restart.
 */
export class SubscriptionStore {
  constructor(
    private readonly file: string,
    private readonly baseCurrency: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** All subscriptions, with lapsed auto-renewals rolled forward and new ids saved */
  list(): Subscription[] {
    const loaded = this.read();
    const { subscriptions, changed } = applyAutoRenewals(loaded.subscriptions, this.now());
    if (changed) console.log('[Store] Advanced auto-renewed payment dates');
    if (loaded.idsAssigned) console.log('[Store] Assigned ids to rows without one');
    if (changed || loaded.idsAssigned) this.write(subscriptions);
    return subscriptions;
  }

  get(id: string): Subscription | null {
    return this.list().find((s) => s.id === id) ?? null;
  }

  add(input: SubscriptionInput): Subscription {
    const all = this.list();
    const created: Subscription = { id: generateId(), ...input };
    this.write([...all, created]);
    return created;
  }

  update(id: string, patch: SubscriptionPatch): Subscription | null {
    const all = this.list();
    const index = all.findIndex((s) => s.id === id);
    if (index === -1) return null;

    const updated: Subscription = { ...all[index], ...stripUndefined(patch), id };
    all[index] = updated;
    this.write(all);
    return updated;
  }

  remove(id: string): boolean {
    const all = this.list();
    const remaining = all.filter((s) => s.id !== id);
    if (remaining.length === all.length) return false;
    this.write(remaining);
    return true;
  }

  replaceAll(subscriptions: Subscription[]): void {
    this.write(subscriptions);
  }

  /**
   * replace: imported records become the data set.
   * append: existing plus imported, a repeated name keeps its last record.
   * merge: a known name is overwritten in place (keeping its id), new names are appended.
   */
  import(records: ImportedRecord[], mode: ImportMode): ImportResult {
    const existing = mode === 'replace' ? [] : this.list();
    const usedIds = new Set(existing.map((s) => s.id));
    const withIds = records.map((record) => {
      const { id, ...input } = record;
      const assigned = id && !usedIds.has(id) ? id : generateId();
      usedIds.add(assigned);
      return { id: assigned, ...input };
    });

    const next = combine(existing, withIds, mode);

    const { subscriptions } = applyAutoRenewals(next, this.now());
    this.write(subscriptions);
    console.log(`[Store] Imported ${records.length} records (${mode}), ${subscriptions.length} total`);
    return { imported: records.length, total: subscriptions.length };
  }

  private read(): { subscriptions: Subscription[]; idsAssigned: boolean } {
    if (!fs.existsSync(this.file)) return { subscriptions: [], idsAssigned: false };

    const text = fs.readFileSync(this.file, 'utf-8');
    const result = subscriptionsFromCsv(text, this.baseCurrency);
    if (!result.ok) {
      throw new Error(`${path.basename(this.file)}: ${result.error}`);
    }
    for (const rowError of result.errors) {
      console.warn(`[Store] Skipped row ${rowError.line}: ${rowError.message}`);
    }
    return { subscriptions: result.subscriptions, idsAssigned: result.idsAssigned };
  }

  private write(subscriptions: Subscription[]): void {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.tmp`;
    fs.writeFileSync(tmp, subscriptionsToCsv(subscriptions), 'utf-8');
    fs.renameSync(tmp, this.file);
  }
}

function stripUndefined(patch: SubscriptionPatch): Partial<SubscriptionInput> {
  const out: Partial<SubscriptionInput> = {};
  if (patch.name !== undefined) out.name = patch.name;
  if (patch.vendor !== undefined) out.vendor = patch.vendor;
  if (patch.category !== undefined) out.category = patch.category;
  if (patch.cycle !== undefined) out.cycle = patch.cycle;
  if (patch.amount !== undefined) out.amount = patch.amount;
  if (patch.currency !== undefined) out.currency = patch.currency;
  if (patch.nextPayment !== undefined) out.nextPayment = patch.nextPayment;
  if (patch.autoRenew !== undefined) out.autoRenew = patch.autoRenew;
  return out;
}

function combine(existing: Subscription[], incoming: Subscription[], mode: ImportMode): Subscription[] {
  switch (mode) {
    case 'replace':
      return keepLastByName(incoming);
    case 'append':
      return keepLastByName([...existing, ...incoming]);
    case 'merge': {
      const merged = [...existing];
      for (const record of incoming) {
        const index = merged.findIndex((s) => s.name === record.name);
        if (index === -1) merged.push(record);
        else merged[index] = { ...record, id: merged[index].id };
      }
      return merged;
    }
  }
}

/** Drop earlier records whose name appears again later in the list */
function keepLastByName(subscriptions: Subscription[]): Subscription[] {
  const lastIndex = new Map<string, number>();
  subscriptions.forEach((s, i) => lastIndex.set(s.name, i));
  return subscriptions.filter((s, i) => lastIndex.get(s.name) === i);
}

/**
 * Category list from a one-column CSV (`category` header).
 * Falls back to the built-in list when the file is missing or empty.
 */
export function loadCategories(file: string): string[] {
  if (!fs.existsSync(file)) return [...DEFAULT_CATEGORIES];

  const { headers, records } = rowsToRecords(parseCsv(fs.readFileSync(file, 'utf-8')));
  const column = headers.includes('category') ? 'category' : headers[0];
  if (!column) return [...DEFAULT_CATEGORIES];

  const categories = Array.from(new Set(records.map((r) => r[column]).filter((c) => c)));
  return categories.length > 0 ? categories : [...DEFAULT_CATEGORIES];
}
