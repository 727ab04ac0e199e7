/**
 * Currency tables and conversion.
 * Rates are expressed as units of the base currency per one unit of the keyed currency.
 */
import type { RateTable } from './types';

export const SUPPORTED_CURRENCIES = [
  'THB', 'USD', 'EUR', 'GBP', 'JPY', 'CNY', 'HKD', 'SGD',
  'AUD', 'NZD', 'CHF', 'CAD', 'MYR', 'KRW', 'INR', 'TWD',
  'SAR', 'AED', 'DKK', 'SEK', 'NOK',
] as const;

export const CURRENCY_SYMBOLS: Record<string, string> = {
  THB: '฿', USD: '$', EUR: '€', GBP: '£', JPY: '¥',
  CNY: '¥', HKD: 'HK$', SGD: 'S$', AUD: 'A$', NZD: 'NZ$',
  CHF: 'CHF', CAD: 'C$', MYR: 'RM', KRW: '₩', INR: '₹',
  TWD: 'NT$', SAR: '﷼', AED: 'د.إ', DKK: 'kr', SEK: 'kr', NOK: 'kr',
};

/** Static THB rates used when neither the rate API nor its cache is available */
export const FALLBACK_THB_RATES: RateTable = {
  THB: 1.0,
  USD: 35.5,
  EUR: 38.8,
  GBP: 45.2,
  JPY: 0.24,
  CNY: 4.95,
  HKD: 4.55,
  SGD: 26.5,
  AUD: 23.5,
  NZD: 21.5,
  CHF: 40.0,
  CAD: 26.0,
  MYR: 7.8,
  KRW: 0.027,
  INR: 0.43,
};

export function isSupportedCurrency(code: string): boolean {
  return (SUPPORTED_CURRENCIES as readonly string[]).includes(code);
}

/** Round half away from zero; toPrecision absorbs binary noise such as 1.005 * 100 */
export function roundHalfUp(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const shifted = Number((Math.abs(value) * factor).toPrecision(15));
  return (Math.sign(value) * Math.round(shifted)) / factor;
}

/**
 * Re-express a THB-quoted table against another base currency.
 * Currencies the table cannot relate to the base are dropped.
 */
export function rebaseRates(thbRates: RateTable, base: string): RateTable {
  if (base === 'THB') return { ...thbRates, THB: 1 };

  const baseInThb = thbRates[base];
  if (!baseInThb) return { [base]: 1 };

  const rebased: RateTable = {};
  for (const [code, rate] of Object.entries({ ...thbRates, THB: 1 })) {
    rebased[code] = rate / baseInThb;
  }
  rebased[base] = 1;
  return rebased;
}

export function fallbackRates(base: string): RateTable {
  return rebaseRates(FALLBACK_THB_RATES, base);
}

function rateFor(currency: string, rates: RateTable, base: string): number {
  return rates[currency] ?? fallbackRates(base)[currency] ?? 1;
}

/** Convert an amount in `currency` into the base currency */
export function convertToBase(
  amount: number,
  currency: string,
  rates: RateTable,
  base = 'THB',
): number {
  if (currency === base) return amount;
  return roundHalfUp(amount * rateFor(currency, rates, base));
}

/** Convert an amount in the base currency into `target` */
export function convertFromBase(
  amount: number,
  target: string,
  rates: RateTable,
  base = 'THB',
): number {
  if (target === base) return amount;
  const rate = rateFor(target, rates, base);
  if (rate === 0) return 0;
  return roundHalfUp(amount / rate);
}

/** Units of `to` per unit of `from`, four decimals */
export function crossRate(from: string, to: string, rates: RateTable): number | null {
  const fromRate = rates[from];
  const toRate = rates[to];
  if (fromRate === undefined || toRate === undefined || toRate === 0) return null;
  return roundHalfUp(fromRate / toRate, 4);
}

export function currencySymbol(currency: string): string {
  return CURRENCY_SYMBOLS[currency] ?? currency;
}

const amountFmt = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** ฿1,234.50 / -$3.00 */
export function formatCurrency(amount: number, currency: string): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}${currencySymbol(currency)}${amountFmt.format(Math.abs(amount))}`;
}
