import { buildSnapshot, currentMonth, growthRate } from '../../src/domain/computations.js';
import type { CategoryTrendPoint, EnrichedSubscription, HistorySnapshot } from '../../src/domain/types.js';
import type { Db, HistoryRow } from './db.js';

function parseCategoryTotals(json: string): Record<string, number> {
  try {
    const parsed: unknown = JSON.parse(json);
    if (!parsed || typeof parsed !== 'object') return {};
    const totals: Record<string, number> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'number') totals[key] = value;
    }
    return totals;
  } catch (error) {
    console.warn('[History] Unreadable category totals:', error);
    return {};
  }
}

function rowToSnapshot(row: HistoryRow): HistorySnapshot {
  return {
    date: row.date,
    subscriptionCount: row.subscription_count,
    monthlyTotal: row.monthly_total,
    yearlyEstimate: row.yearly_estimate,
    categoryTotals: parseCategoryTotals(row.category_totals),
  };
}

/** Monthly spend snapshots, one per calendar month */
export class HistoryService {
  constructor(private readonly db: Db) {}

  recordSnapshot(subs: EnrichedSubscription[], today: Date = new Date()): HistorySnapshot {
    const snapshot = buildSnapshot(subs, today);
    const month = currentMonth(today);
    this.db
      .prepare<[string, string, number, number, number, string]>(`
        INSERT INTO history (month, date, subscription_count, monthly_total, yearly_estimate, category_totals)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT(month) DO UPDATE SET
          date = excluded.date,
          subscription_count = excluded.subscription_count,
          monthly_total = excluded.monthly_total,
          yearly_estimate = excluded.yearly_estimate,
          category_totals = excluded.category_totals
      `)
      .run(
        month,
        snapshot.date,
        snapshot.subscriptionCount,
        snapshot.monthlyTotal,
        snapshot.yearlyEstimate,
        JSON.stringify(snapshot.categoryTotals),
      );
    console.log(`[History] Recorded snapshot for ${month}`);
    return snapshot;
  }

  /** The most recent `months` snapshots, oldest first */
  trend(months = 12): HistorySnapshot[] {
    const rows = this.db
      .prepare<[number], HistoryRow>('SELECT * FROM history ORDER BY month DESC LIMIT ?')
      .all(months);
    return rows.reverse().map(rowToSnapshot);
  }

  categoryTrend(category: string, months = 12): CategoryTrendPoint[] {
    return this.trend(months).map((s) => ({ date: s.date, monthlyCost: s.categoryTotals[category] ?? 0 }));
  }

  growthRate(): number | null {
    return growthRate(this.trend(2));
  }
}
