import { describe, expect, it } from 'vitest';
import {
  normalizeHeader,
  parseBoolean,
  recordToInput,
  sanitizeString,
  validateSubscriptionInput,
  validateSubscriptionPatch,
} from '../domain/validation';

const validInput = {
  name: 'Chatbot Pro',
  vendor: 'Bots Ltd',
  category: 'AI',
  cycle: 'monthly',
  amount: 20,
  currency: 'USD',
  nextPayment: '2025-03-15',
  autoRenew: true,
};

describe('validateSubscriptionInput', () => {
  it('normalises a valid input', () => {
    const result = validateSubscriptionInput({
      ...validInput,
      name: '  Chatbot Pro  ',
      cycle: 'Annual',
      amount: '9.999',
      currency: ' usd ',
    });
    expect(result).toEqual({
      ok: true,
      value: { ...validInput, cycle: 'yearly', amount: 10, currency: 'USD' },
    });
  });

  it('defaults vendor and auto-renew', () => {
    const { vendor: _vendor, autoRenew: _autoRenew, ...rest } = validInput;
    const result = validateSubscriptionInput(rest);
    expect(result.ok && result.value.vendor).toBe('');
    expect(result.ok && result.value.autoRenew).toBe(false);
  });

  it.each([
    [{ name: '' }, 'name', 'Name is required'],
    [{ name: undefined }, 'name', 'Name is required'],
    [{ name: 'x'.repeat(101) }, 'name', 'Name is too long (max 100 characters)'],
    [{ cycle: 'weekly' }, 'cycle', 'Unknown billing cycle: weekly'],
    [{ amount: 0 }, 'amount', 'Amount must be greater than 0'],
    [{ amount: 0.001 }, 'amount', 'Amount must be greater than 0'],
    [{ amount: 'abc' }, 'amount', 'Amount must be a number'],
    [{ amount: 2_000_000 }, 'amount', 'Amount is out of range'],
    [{ currency: 'btc' }, 'currency', 'Unsupported currency: BTC'],
    [{ nextPayment: '2025-02-30' }, 'nextPayment', 'Invalid date, use YYYY-MM-DD'],
  ])('rejects %o', (override, field, error) => {
    expect(validateSubscriptionInput({ ...validInput, ...override })).toEqual({ ok: false, field, error });
  });
});

describe('validateSubscriptionPatch', () => {
  it('accepts a partial update and still checks the fields it has', () => {
    expect(validateSubscriptionPatch({ amount: '12.5' })).toEqual({ ok: true, value: { amount: 12.5 } });
    expect(validateSubscriptionPatch({ currency: 'ZZZ' })).toEqual({
      ok: false,
      field: 'currency',
      error: 'Unsupported currency: ZZZ',
    });
  });
});

describe('loose values', () => {
  it('parses booleans leniently', () => {
    for (const value of ['TRUE', 'true', 'T', 'yes', 'Y', '1', true]) expect(parseBoolean(value)).toBe(true);
    for (const value of ['FALSE', 'no', '0', '', null, undefined, false]) expect(parseBoolean(value)).toBe(false);
  });

  it('trims and truncates strings', () => {
    expect(sanitizeString('  abc  ', 2)).toBe('ab');
    expect(sanitizeString(null)).toBe('');
    expect(sanitizeString(42)).toBe('42');
  });

  it('normalises header spellings', () => {
    expect(normalizeHeader('Next Payment')).toBe('next_payment');
    expect(normalizeHeader('autoRenew')).toBe('auto_renew');
    expect(normalizeHeader('Billing-Cycle')).toBe('cycle');
    expect(normalizeHeader(' Price ')).toBe('amount');
  });
});

describe('recordToInput', () => {
  it('cleans a spreadsheet-style row', () => {
    const result = recordToInput(
      {
        Name: 'Tune Box',
        Category: 'Music',
        Cycle: 'monthly',
        Amount: '1,290.00',
        Currency: 'nan',
        'Next Payment': '2025-04-01',
        'Auto Renew': 'yes',
      },
      'THB',
    );
    expect(result).toEqual({
      ok: true,
      value: {
        name: 'Tune Box',
        vendor: '',
        category: 'Music',
        cycle: 'monthly',
        amount: 1290,
        currency: 'THB',
        nextPayment: '2025-04-01',
        autoRenew: true,
      },
    });
  });

  it('keeps a provided id and accepts numeric cells', () => {
    const result = recordToInput(
      { id: 'keep-me', name: 'Cloud Disk', category: 'System', cycle: 'yearly', amount: 99, next_payment: '2025-12-01', auto_renew: 'FALSE', currency: 'EUR' },
      'THB',
    );
    expect(result.ok && result.value.id).toBe('keep-me');
    expect(result.ok && result.value.amount).toBe(99);
  });

  it('reports the first failing field', () => {
    const result = recordToInput({ name: 'No Date', category: 'AI', cycle: 'monthly', amount: '5' }, 'THB');
    expect(result).toEqual({ ok: false, field: 'nextPayment', error: 'Next payment date is required' });
  });
});
