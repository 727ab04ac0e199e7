import { useCallback, useEffect, useState } from 'react';
import { getHistory, recordSnapshot, type ApiHistory, type ApiOptions, type ApiSummary } from '../../api/client';
import { CategoryDonut } from '../components/CategoryDonut';
import { CategoryTrend } from '../components/CategoryTrend';
import { CostFlowSankey } from '../components/CostFlowSankey';
import { CycleBars } from '../components/CycleBars';
import { EmptyState } from '../components/EmptyState';
import { PaymentTimeline } from '../components/PaymentTimeline';
import { ReminderPanel } from '../components/ReminderPanel';
import { TrendChart } from '../components/TrendChart';

export interface AnalyticsScreenProps {
  summary: ApiSummary;
  options: ApiOptions;
}

export function AnalyticsScreen({ summary, options }: AnalyticsScreenProps) {
  const [history, setHistory] = useState<ApiHistory>({ snapshots: [], growthRate: null });
  const [status, setStatus] = useState<string | null>(null);
  const [saving, setSaving] = useState(false);
  const [trendCategory, setTrendCategory] = useState('');

  const fetchHistory = useCallback(async () => {
    try {
      setHistory(await getHistory(12, trendCategory || undefined));
    } catch (err) {
      console.error('[History] Failed to load:', err);
      setStatus(err instanceof Error ? err.message : 'Failed to load history');
    }
  }, [trendCategory]);

  useEffect(() => {
    void fetchHistory();
  }, [fetchHistory]);

  const handleSnapshot = async () => {
    setSaving(true);
    setStatus(null);
    try {
      const snapshot = await recordSnapshot();
      setStatus(`Snapshot saved for ${snapshot.date}`);
      await fetchHistory();
    } catch (err) {
      setStatus(err instanceof Error ? err.message : 'Failed to record snapshot');
    } finally {
      setSaving(false);
    }
  };

  const { baseCurrency } = summary;

  return (
    <div className="screen-content analytics-screen">
      {summary.kpis.totalCount === 0 ? (
        <EmptyState />
      ) : (
        <div className="card-grid">
          <CategoryDonut categories={summary.categories} baseCurrency={baseCurrency} />
          <CycleBars cycles={summary.cycles} baseCurrency={baseCurrency} showCost />
          <PaymentTimeline timeline={summary.timeline} />
        </div>
      )}

      <TrendChart snapshots={history.snapshots} growthRate={history.growthRate} baseCurrency={baseCurrency} />
      <div className="button-row">
        <button className="btn" onClick={() => void handleSnapshot()} disabled={saving}>
          {saving ? 'Saving...' : 'Record snapshot for this month'}
        </button>
        {status && <span className="status-line">{status}</span>}
      </div>
      <CategoryTrend
        categories={options.categories}
        category={trendCategory}
        points={history.categoryTrend ?? []}
        baseCurrency={baseCurrency}
        onCategoryChange={setTrendCategory}
      />

      {summary.kpis.totalCount > 0 && <CostFlowSankey flow={summary.costFlow} baseCurrency={baseCurrency} />}
      <ReminderPanel defaultDays={options.reminderDays} />
    </div>
  );
}
