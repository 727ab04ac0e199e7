import { useCallback, useEffect, useState } from 'react';
import { getSubscriptions, type ApiOptions } from '../../api/client';
import type { EnrichedSubscription, SortKey } from '../../domain/types';
import { EmptyState } from '../components/EmptyState';
import { ImportPanel } from '../components/ImportPanel';
import { SubscriptionTable } from '../components/SubscriptionTable';

const SORT_OPTIONS: { key: SortKey; label: string }[] = [
  { key: 'days-asc', label: 'Next payment (soonest)' },
  { key: 'days-desc', label: 'Next payment (latest)' },
  { key: 'cost-desc', label: 'Monthly cost (highest)' },
  { key: 'cost-asc', label: 'Monthly cost (lowest)' },
  { key: 'name', label: 'Name' },
];

type RenewalFilter = 'all' | 'auto' | 'manual';

export interface SubscriptionsScreenProps {
  options: ApiOptions;
  /** Bumped by the shell whenever data changes elsewhere */
  revision: number;
  onChanged: () => void;
}

export function SubscriptionsScreen({ options, revision, onChanged }: SubscriptionsScreenProps) {
  const [subscriptions, setSubscriptions] = useState<EnrichedSubscription[]>([]);
  const [category, setCategory] = useState('');
  const [renewal, setRenewal] = useState<RenewalFilter>('all');
  const [sort, setSort] = useState<SortKey>('days-asc');
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const fetchSubscriptions = useCallback(async () => {
    setLoading(true);
    try {
      const data = await getSubscriptions({
        category: category || undefined,
        autoRenew: renewal === 'all' ? undefined : renewal === 'auto',
        sort,
      });
      setSubscriptions(data);
      setError(null);
    } catch (err) {
      console.error('[Subscriptions] Failed to load:', err);
      setError(err instanceof Error ? err.message : 'Failed to load subscriptions');
    } finally {
      setLoading(false);
    }
  }, [category, renewal, sort]);

  useEffect(() => {
    void fetchSubscriptions();
  }, [fetchSubscriptions, revision]);

  const filtered = category !== '' || renewal !== 'all';

  return (
    <div className="screen-content subscriptions-screen">
      <div className="filter-bar">
        <label>
          Category{' '}
          <select value={category} onChange={(e) => setCategory(e.target.value)}>
            <option value="">All</option>
            {options.categories.map((c) => (
              <option key={c} value={c}>
                {c}
              </option>
            ))}
          </select>
        </label>
        <label>
          Renewal{' '}
          <select
            value={renewal}
            onChange={(e) => {
              const value = e.target.value;
              if (value === 'all' || value === 'auto' || value === 'manual') setRenewal(value);
            }}
          >
            <option value="all">All</option>
            <option value="auto">Auto-renew</option>
            <option value="manual">Manual</option>
          </select>
        </label>
        <label>
          Sort{' '}
          <select
            value={sort}
            onChange={(e) => {
              const next = SORT_OPTIONS.find((o) => o.key === e.target.value);
              if (next) setSort(next.key);
            }}
          >
            {SORT_OPTIONS.map((o) => (
              <option key={o.key} value={o.key}>
                {o.label}
              </option>
            ))}
          </select>
        </label>
      </div>

      {error && (
        <p className="status-line error" role="alert">
          {error}
        </p>
      )}

      {loading && subscriptions.length === 0 ? (
        <p className="loading">Loading...</p>
      ) : subscriptions.length === 0 ? (
        filtered ? <p className="no-data">No subscriptions match the filters</p> : <EmptyState />
      ) : (
        <SubscriptionTable subscriptions={subscriptions} options={options} onChanged={onChanged} />
      )}

      <ImportPanel modes={options.importModes} onImported={onChanged} />
    </div>
  );
}
