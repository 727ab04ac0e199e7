import { formatCurrency } from '../../domain/currency';
import type { HistorySnapshot } from '../../domain/types';
import { formatMonth } from '../format';

/** Round up to 1, 2 or 5 times a power of ten */
function niceCeil(value: number): number {
  if (value <= 0) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(value));
  const step = [1, 2, 5, 10].find((m) => m * magnitude >= value) ?? 10;
  return step * magnitude;
}

export function formatGrowth(rate: number | null): string {
  if (rate === null) return 'n/a';
  return `${rate > 0 ? '+' : ''}${rate.toFixed(1)}%`;
}

interface TrendChartProps {
  snapshots: HistorySnapshot[];
  growthRate: number | null;
  baseCurrency: string;
}

export function TrendChart({ snapshots, growthRate, baseCurrency }: TrendChartProps) {
  if (snapshots.length < 2) {
    return (
      <section className="trend-card" aria-label="Spending trend">
        <h3 className="trend-title">Spending trend</h3>
        <p className="no-data">The trend appears once two monthly snapshots have been recorded</p>
      </section>
    );
  }

  const topTick = niceCeil(Math.max(...snapshots.map((s) => s.monthlyTotal)));
  const midTick = topTick / 2;
  const latest = snapshots[snapshots.length - 1];

  return (
    <section className="trend-card" aria-label="Spending trend">
      <h3 className="trend-title">Spending trend</h3>
      <p className="trend-growth" data-testid="trend-growth">
        Latest {formatCurrency(latest.monthlyTotal, baseCurrency)}/mo, change{' '}
        <span className={growthRate !== null && growthRate > 0 ? 'up' : 'down'}>{formatGrowth(growthRate)}</span>
      </p>
      <div className="trend-chart-wrap">
        <div className="trend-y-axis">
          <span>{formatCurrency(topTick, baseCurrency)}</span>
          <span>{formatCurrency(midTick, baseCurrency)}</span>
          <span>{formatCurrency(0, baseCurrency)}</span>
        </div>

        <div className="trend-plot-area">
          <div className="trend-bars">
            {snapshots.map((item) => {
              const barHeight = (item.monthlyTotal / topTick) * 100;
              return (
                <div className="trend-bar-group" key={item.date}>
                  <div className="trend-bar-rail">
                    <div
                      className="trend-bar"
                      style={{ height: `${Math.max(barHeight, 3)}%` }}
                      title={`${formatMonth(item.date)} ${formatCurrency(item.monthlyTotal, baseCurrency)} (${item.subscriptionCount})`}
                    />
                  </div>
                  <span className="trend-month-label">{formatMonth(item.date)}</span>
                </div>
              );
            })}
          </div>
        </div>
      </div>
    </section>
  );
}
