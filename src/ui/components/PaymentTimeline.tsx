import { formatCurrency } from '../../domain/currency';
import type { TimelineEntry } from '../../domain/types';
import { describeDays, formatDateKey } from '../format';

interface PaymentTimelineProps {
  timeline: TimelineEntry[];
  horizonDays?: number;
}

export function PaymentTimeline({ timeline, horizonDays = 90 }: PaymentTimelineProps) {
  return (
    <section className="card" aria-label="Payment timeline">
      <h3 className="card-title">Payments in the next {horizonDays} days</h3>
      {timeline.length === 0 ? (
        <p className="no-data">No payments due</p>
      ) : (
        <ol className="timeline">
          {timeline.map((entry) => (
            <li key={entry.id} className={`timeline-item ${entry.autoRenew ? 'auto' : 'manual'}`}>
              <span className="timeline-date">{formatDateKey(entry.date)}</span>
              <span className="timeline-name">{entry.name}</span>
              <span className="timeline-amount">{formatCurrency(entry.amount, entry.currency)}</span>
              <span className="timeline-kind">{entry.autoRenew ? 'charges' : 'renew manually'}</span>
              <span className="cell-sub">{describeDays(entry.daysRemaining)}</span>
            </li>
          ))}
        </ol>
      )}
    </section>
  );
}
