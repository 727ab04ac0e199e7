import { formatCurrency } from '../../domain/currency';
import type { EnrichedSubscription } from '../../domain/types';

interface TopSubscriptionsProps {
  top: EnrichedSubscription[];
  baseCurrency: string;
}

export function TopSubscriptions({ top, baseCurrency }: TopSubscriptionsProps) {
  return (
    <section className="card" aria-label="Most expensive">
      <h3 className="card-title">Most expensive</h3>
      <ol className="top-list">
        {top.map((s) => (
          <li key={s.id}>
            <span className="top-name">{s.name}</span>
            <span className="top-amount">{formatCurrency(s.monthlyCost, baseCurrency)}/mo</span>
          </li>
        ))}
      </ol>
    </section>
  );
}
