import { z } from 'zod';
import { toDateKey } from '../../src/domain/computations.js';
import { FALLBACK_THB_RATES, rebaseRates } from '../../src/domain/currency.js';
import type { RateTable } from '../../src/domain/types.js';
import type { Db, RateRow } from './db.js';

export const RATE_API_URL = 'https://gateway.api.bot.or.th/Stat-ExchangeRate/v2/DAILY_AVG_EXG_RATE/';
const LOOKBACK_DAYS = 7;
const REQUEST_TIMEOUT_MS = 10_000;
const MS_PER_DAY = 86_400_000;

export type RateStatusKind = 'success' | 'cached' | 'updating' | 'error' | 'fallback' | 'unknown';

export interface RateStatus {
  status: RateStatusKind;
  message: string;
  lastUpdated: string | null;
  source: string | null;
}

export interface RatesResult {
  base: string;
  rates: RateTable;
  status: RateStatus;
}

export interface RateServiceOptions {
  token: string;
  baseCurrency: string;
  ttlSeconds: number;
  /** Per request; a gateway that stops answering falls through to the cache */
  timeoutMs?: number;
  fetchFn?: typeof fetch;
  now?: () => Date;
}

// Only the fields we read; the gateway sends many more
const DailyRateResponseSchema = z.object({
  result: z.object({
    data: z.object({
      data_detail: z.array(
        z.object({
          currency_id: z.string().optional(),
          mid_rate: z.union([z.string(), z.number()]).nullish(),
        }),
      ),
    }),
  }),
});

/** THB per unit for each currency in a daily-average response; THB itself is always present */
export function parseDailyRates(body: unknown): RateTable {
  const rates: RateTable = { THB: 1 };
  const parsed = DailyRateResponseSchema.safeParse(body);
  if (!parsed.success) return rates;

  for (const item of parsed.data.result.data.data_detail) {
    if (!item.currency_id || item.mid_rate === null || item.mid_rate === undefined || item.mid_rate === '') continue;
    const rate = Number(item.mid_rate);
    if (Number.isFinite(rate)) rates[item.currency_id] = rate;
  }
  return rates;
}

/**
 * Exchange rates from the Bank of Thailand daily average rate API,
 * cached in SQLite. Rates are stored against THB and re-based on the way out.
 */
export class RateService {
  private status: RateStatus = { status: 'unknown', message: 'Rates not loaded yet', lastUpdated: null, source: null };
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;

  constructor(
    private readonly db: Db,
    private readonly options: RateServiceOptions,
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  getStatus(): RateStatus {
    return { ...this.status };
  }

  async getRates({ forceRefresh = false }: { forceRefresh?: boolean } = {}): Promise<RatesResult> {
    return this.result(await this.loadThbRates(forceRefresh));
  }

  private result(thbRates: RateTable): RatesResult {
    const base = this.options.baseCurrency;
    return { base, rates: rebaseRates(thbRates, base), status: this.getStatus() };
  }

  private async loadThbRates(forceRefresh: boolean): Promise<RateTable> {
    if (!forceRefresh) {
      const cached = this.readCache();
      if (cached) {
        const ageSeconds = (this.now().getTime() - new Date(cached.updatedAt).getTime()) / 1000;
        if (ageSeconds < this.options.ttlSeconds) {
          this.setStatus('cached', `Using cached rates (updated ${Math.floor(ageSeconds / 60)} minutes ago)`, cached.updatedAt, 'cache');
          return cached.rates;
        }
      }
    }

    const fetched = await this.fetchFromApi();
    if (fetched) return fetched;

    const stale = this.readCache();
    if (stale) {
      console.warn('[Rates] Rate API unavailable, using stale cache');
      this.setStatus('cached', 'Rate API failed, using previously cached rates', stale.updatedAt, 'cache (stale)');
      return stale.rates;
    }

    console.warn('[Rates] Rate API unavailable and no cache, using fallback table');
    this.setStatus('fallback', 'Rate API failed, using built-in fallback rates', null, 'fallback table');
    return { ...FALLBACK_THB_RATES };
  }

  /** Try each of the previous days until one has data (weekends and holidays have none) */
  private async fetchFromApi(): Promise<RateTable | null> {
    if (!this.options.token) {
      this.setStatus('error', 'RATE_API_TOKEN is not configured', null, null);
      return null;
    }

    this.setStatus('updating', 'Fetching rates from the Bank of Thailand', this.status.lastUpdated, this.status.source);
    const today = this.now();

    try {
      for (let daysAgo = 1; daysAgo <= LOOKBACK_DAYS; daysAgo++) {
        const day = toDateKey(new Date(today.getTime() - daysAgo * MS_PER_DAY));
        const res = await this.fetchFn(`${RATE_API_URL}?start_period=${day}&end_period=${day}`, {
          headers: { Accept: 'application/json', Authorization: this.options.token },
          signal: AbortSignal.timeout(this.options.timeoutMs ?? REQUEST_TIMEOUT_MS),
        });
        if (!res.ok) {
          this.setStatus('error', `Rate API returned status ${res.status}`, null, null);
          return null;
        }

        const rates = parseDailyRates(await res.json());
        if (Object.keys(rates).length > 1) {
          const updatedAt = this.now().toISOString();
          this.writeCache(rates, updatedAt);
          this.setStatus(
            'success',
            `Rates updated for ${day}: ${Object.keys(rates).length} currencies`,
            updatedAt,
            'Bank of Thailand API',
          );
          console.log(`[Rates] Fetched ${Object.keys(rates).length} rates for ${day}`);
          return rates;
        }
      }
    } catch (error) {
      console.error('[Rates] Rate API request failed:', error);
      const reason = error instanceof Error ? error.message : String(error);
      this.setStatus('error', `Rate API request failed: ${reason}`, null, null);
      return null;
    }

    this.setStatus('error', `No rate data for the last ${LOOKBACK_DAYS} days`, null, null);
    return null;
  }

  private readCache(): { rates: RateTable; updatedAt: string } | null {
    const rows = this.db.prepare<[], RateRow>('SELECT currency, rate, updated_at FROM exchange_rates').all();
    if (rows.length === 0) return null;

    const rates: RateTable = {};
    let updatedAt = rows[0].updated_at;
    for (const row of rows) {
      rates[row.currency] = row.rate;
      if (row.updated_at < updatedAt) updatedAt = row.updated_at;
    }
    return { rates, updatedAt };
  }

  private writeCache(rates: RateTable, updatedAt: string): void {
    const insert = this.db.prepare<[string, number, string]>(
      'INSERT INTO exchange_rates (currency, rate, updated_at) VALUES (?, ?, ?)',
    );
    const replace = this.db.transaction((table: RateTable) => {
      this.db.prepare('DELETE FROM exchange_rates').run();
      for (const [currency, rate] of Object.entries(table)) {
        insert.run(currency, rate, updatedAt);
      }
    });
    replace(rates);
  }

  private setStatus(status: RateStatusKind, message: string, lastUpdated: string | null, source: string | null): void {
    this.status = { status, message, lastUpdated, source };
  }
}
