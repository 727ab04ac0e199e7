import { useCallback, useEffect, useState } from 'react';
import {
  createSubscription,
  getOptions,
  getRates,
  getSummary,
  refreshRates,
  type ApiOptions,
  type ApiRates,
  type ApiSummary,
} from '../api/client';
import { formatCurrency } from '../domain/currency';
import type { SubscriptionInput } from '../domain/types';
import { SubscriptionForm } from './components/SubscriptionForm';
import { AnalyticsScreen } from './screens/AnalyticsScreen';
import { DashboardScreen } from './screens/DashboardScreen';
import { SubscriptionsScreen } from './screens/SubscriptionsScreen';

const VIEWS = [
  { key: 'dashboard', label: 'Dashboard' },
  { key: 'subscriptions', label: 'Subscriptions' },
  { key: 'analytics', label: 'Analytics' },
] as const;

type View = (typeof VIEWS)[number]['key'];

export function AppShell() {
  const [view, setView] = useState<View>('dashboard');
  const [options, setOptions] = useState<ApiOptions | null>(null);
  const [summary, setSummary] = useState<ApiSummary | null>(null);
  const [rates, setRates] = useState<ApiRates | null>(null);
  const [refreshingRates, setRefreshingRates] = useState(false);
  const [revision, setRevision] = useState(0);
  const [error, setError] = useState<string | null>(null);

  const fetchAll = useCallback(async () => {
    try {
      const [opts, sum, rateInfo] = await Promise.all([getOptions(), getSummary(), getRates()]);
      setOptions(opts);
      setSummary(sum);
      setRates(rateInfo);
      setError(null);
    } catch (err) {
      console.error('[App] Failed to load data:', err);
      setError(err instanceof Error ? err.message : 'Failed to load data');
    }
  }, []);

  useEffect(() => {
    void fetchAll();
  }, [fetchAll]);

  const handleChanged = useCallback(() => {
    setRevision((r) => r + 1);
    void fetchAll();
  }, [fetchAll]);

  const handleRefreshRates = async () => {
    setRefreshingRates(true);
    try {
      setRates(await refreshRates());
      setSummary(await getSummary());
    } catch (err) {
      console.error('[Rates] Refresh failed:', err);
      setError(err instanceof Error ? err.message : 'Failed to refresh rates');
    } finally {
      setRefreshingRates(false);
    }
  };

  const handleCreate = async (input: SubscriptionInput) => {
    await createSubscription(input);
    handleChanged();
  };

  if (!options || !summary) {
    return (
      <div className="app-shell loading-shell">
        {error ? (
          <p className="status-line error" role="alert">
            {error}
          </p>
        ) : (
          <p className="loading">Loading...</p>
        )}
      </div>
    );
  }

  return (
    <div className="app-shell">
      <header className="app-header">
        <h1 className="app-title">Subscriptions</h1>
        <nav className="view-tabs" aria-label="Views">
          {VIEWS.map((v) => (
            <button
              key={v.key}
              className={`view-tab ${view === v.key ? 'active' : ''}`}
              aria-current={view === v.key ? 'page' : undefined}
              onClick={() => setView(v.key)}
            >
              {v.label}
            </button>
          ))}
        </nav>
      </header>

      {error && (
        <p className="status-line error" role="alert">
          {error}
        </p>
      )}

      <div className="app-body">
        <main className="app-main">
          {view === 'dashboard' && (
            <DashboardScreen
              summary={summary}
              rates={rates}
              refreshingRates={refreshingRates}
              onRefreshRates={() => void handleRefreshRates()}
            />
          )}
          {view === 'subscriptions' && (
            <SubscriptionsScreen options={options} revision={revision} onChanged={handleChanged} />
          )}
          {view === 'analytics' && <AnalyticsScreen summary={summary} options={options} />}
        </main>

        <aside className="side-panel">
          <section className="card">
            <h3 className="card-title">Add subscription</h3>
            <SubscriptionForm options={options} onSubmit={handleCreate} />
          </section>
          <section className="card overview" aria-label="Overview">
            <h3 className="card-title">Overview</h3>
            <dl>
              <dt>Subscriptions</dt>
              <dd>{summary.kpis.totalCount}</dd>
              <dt>Monthly spend</dt>
              <dd>{formatCurrency(summary.kpis.monthlyTotal, summary.baseCurrency)}</dd>
            </dl>
          </section>
        </aside>
      </div>
    </div>
  );
}
