import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type Db } from '../src/db.js';
import { RATE_API_URL, RateService, parseDailyRates } from '../src/rates.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function dailyRates(details: { currency_id: string; mid_rate: string }[]) {
  return { result: { data: { data_detail: details } } };
}

const USD_EUR = dailyRates([
  { currency_id: 'USD', mid_rate: '34.1000000' },
  { currency_id: 'EUR', mid_rate: '37.25' },
  { currency_id: 'JPY', mid_rate: '' },
]);

describe('parseDailyRates', () => {
  it('reads mid rates and always includes THB', () => {
    expect(parseDailyRates(USD_EUR)).toEqual({ THB: 1, USD: 34.1, EUR: 37.25 });
  });

  it('ignores bodies of the wrong shape', () => {
    expect(parseDailyRates({ error: 'unauthorized' })).toEqual({ THB: 1 });
    expect(parseDailyRates(null)).toEqual({ THB: 1 });
  });
});

describe('RateService', () => {
  let db: Db;
  let now: Date;

  beforeEach(() => {
    db = openDatabase(':memory:');
    now = new Date(2025, 2, 3, 10, 0, 0);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  function service(fetchFn: typeof fetch, options: { token?: string; base?: string; timeoutMs?: number } = {}) {
    return new RateService(db, {
      token: options.token ?? 'test-token',
      baseCurrency: options.base ?? 'THB',
      ttlSeconds: 3600,
      timeoutMs: options.timeoutMs,
      fetchFn,
      now: () => now,
    });
  }

  it('fetches yesterday’s rates with the token and caches them', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR));
    const result = await service(fetchFn).getRates();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(`${RATE_API_URL}?start_period=2025-03-02&end_period=2025-03-02`);
    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ Accept: 'application/json', Authorization: 'test-token' });
    expect(result.rates).toEqual({ THB: 1, USD: 34.1, EUR: 37.25 });
    expect(result.status).toMatchObject({ status: 'success', source: 'Bank of Thailand API' });
    expect(result.status.lastUpdated).toBe(now.toISOString());

    const cached = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM exchange_rates').get();
    expect(cached?.n).toBe(3);
  });

  it('walks back over days without data', async () => {
    const fetchFn = vi
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR))
      .mockResolvedValueOnce(jsonResponse(dailyRates([])))
      .mockResolvedValueOnce(jsonResponse(dailyRates([])));
    const result = await service(fetchFn).getRates();

    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fetchFn.mock.calls[2][0]).toContain('start_period=2025-02-28');
    expect(result.status.message).toBe('Rates updated for 2025-02-28: 3 currencies');
  });

  it('serves fresh cache without calling the API', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR));
    const rates = service(fetchFn);
    await rates.getRates();

    now = new Date(2025, 2, 3, 10, 30, 0);
    const second = await rates.getRates();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(second.rates.USD).toBe(34.1);
    expect(second.status).toMatchObject({ status: 'cached', message: 'Using cached rates (updated 30 minutes ago)' });
  });

  it('refreshes when forced even with a fresh cache', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR));
    const rates = service(fetchFn);
    await rates.getRates();
    await rates.getRates({ forceRefresh: true });

    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('falls back to the stale cache when the API fails', async () => {
    const fetchFn = vi
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse({}, 500))
      .mockResolvedValueOnce(jsonResponse(USD_EUR));
    const rates = service(fetchFn);
    await rates.getRates();

    now = new Date(2025, 2, 3, 12, 0, 0);
    const result = await rates.getRates();

    expect(result.rates.USD).toBe(34.1);
    expect(result.status).toMatchObject({ status: 'cached', source: 'cache (stale)' });
  });

  it('uses the built-in table when there is neither API nor cache', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error('network down');
    });
    const result = await service(fetchFn).getRates();

    expect(result.rates.USD).toBe(35.5);
    expect(result.status).toEqual({
      status: 'fallback',
      message: 'Rate API failed, using built-in fallback rates',
      lastUpdated: null,
      source: 'fallback table',
    });
  });

  it('gives up on a gateway that never answers and falls back', async () => {
    // Settles only when the request is aborted, like fetch does
    const fetchFn = vi.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('request timed out')));
        }),
    );
    const result = await service(fetchFn, { timeoutMs: 20 }).getRates();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    expect(result.rates.USD).toBe(35.5);
    expect(result.status.status).toBe('fallback');
  });

  it('does not call the API without a token', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR));
    const rates = service(fetchFn, { token: '' });
    const result = await rates.getRates();

    expect(fetchFn).not.toHaveBeenCalled();
    expect(result.status.status).toBe('fallback');
  });

  it('re-bases THB quotes for another base currency', async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(USD_EUR));
    const result = await service(fetchFn, { base: 'USD' }).getRates();

    expect(result.base).toBe('USD');
    expect(result.rates.USD).toBe(1);
    expect(result.rates.THB).toBeCloseTo(1 / 34.1, 10);
    expect(result.rates.EUR).toBeCloseTo(37.25 / 34.1, 10);
  });
});
