import type { ApiRates } from '../../api/client';

interface RateStatusLineProps {
  rates: ApiRates | null;
  refreshing: boolean;
  onRefresh: () => void;
}

export function RateStatusLine({ rates, refreshing, onRefresh }: RateStatusLineProps) {
  const status = rates?.status;
  const kind = refreshing ? 'updating' : status?.status ?? 'unknown';
  const message = refreshing ? 'Updating exchange rates...' : status?.message ?? 'Exchange rates not loaded';

  return (
    <div className={`rate-status ${kind}`} data-testid="rate-status">
      <span className="rate-status-message">{message}</span>
      {status?.source && !refreshing && <span className="rate-status-source"> ({status.source})</span>}
      <button className="btn btn-ghost btn-small" onClick={onRefresh} disabled={refreshing}>
        Refresh rates
      </button>
    </div>
  );
}
