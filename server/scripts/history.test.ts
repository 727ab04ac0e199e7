import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { EnrichedSubscription } from '../../src/domain/types.js';
import { openDatabase, type Db } from '../src/db.js';
import { HistoryService } from '../src/history.js';

function makeEnriched(overrides: Partial<EnrichedSubscription> = {}): EnrichedSubscription {
  return {
    id: 'a1',
    name: 'Chatbot Pro',
    vendor: '',
    category: 'AI',
    cycle: 'monthly',
    amount: 100,
    currency: 'THB',
    nextPayment: '2025-03-10',
    autoRenew: true,
    daysRemaining: 9,
    amountInBase: 100,
    monthlyCost: 100,
    ...overrides,
  };
}

describe('HistoryService', () => {
  let db: Db;
  let history: HistoryService;

  beforeEach(() => {
    db = openDatabase(':memory:');
    history = new HistoryService(db);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  it('stores one snapshot per month, replacing re-recorded months', () => {
    history.recordSnapshot([makeEnriched()], new Date(2025, 0, 20));
    history.recordSnapshot([makeEnriched()], new Date(2025, 1, 5));
    history.recordSnapshot([makeEnriched(), makeEnriched({ id: 'b', category: 'Video', monthlyCost: 50 })], new Date(2025, 1, 25));

    expect(history.trend()).toEqual([
      { date: '2025-01-20', subscriptionCount: 1, monthlyTotal: 100, yearlyEstimate: 1200, categoryTotals: { AI: 100 } },
      {
        date: '2025-02-25',
        subscriptionCount: 2,
        monthlyTotal: 150,
        yearlyEstimate: 1800,
        categoryTotals: { AI: 100, Video: 50 },
      },
    ]);
  });

  it('limits the trend to the most recent months, oldest first', () => {
    for (let month = 0; month < 5; month++) {
      history.recordSnapshot([makeEnriched({ monthlyCost: 100 + month })], new Date(2025, month, 1));
    }
    expect(history.trend(3).map((s) => s.date)).toEqual(['2025-03-01', '2025-04-01', '2025-05-01']);
  });

  it('tracks one category over time', () => {
    history.recordSnapshot([makeEnriched()], new Date(2025, 0, 1));
    history.recordSnapshot([makeEnriched({ category: 'Video' })], new Date(2025, 1, 1));
    expect(history.categoryTrend('AI')).toEqual([
      { date: '2025-01-01', monthlyCost: 100 },
      { date: '2025-02-01', monthlyCost: 0 },
    ]);
  });

  it('reports growth between the last two snapshots', () => {
    expect(history.growthRate()).toBeNull();
    history.recordSnapshot([makeEnriched({ monthlyCost: 200 })], new Date(2025, 0, 1));
    history.recordSnapshot([makeEnriched({ monthlyCost: 250 })], new Date(2025, 1, 1));
    expect(history.growthRate()).toBe(25);
  });
});
