import { formatCurrency } from '../../domain/currency';
import type { EnrichedSubscription } from '../../domain/types';
import { describeDays } from '../format';

interface RenewalBannerProps {
  upcoming: EnrichedSubscription[];
  warningDays: number;
}

export function RenewalBanner({ upcoming, warningDays }: RenewalBannerProps) {
  if (upcoming.length === 0) {
    return (
      <div className="renewal-banner clear" role="status">
        No auto-renewals in the next {warningDays} days.
      </div>
    );
  }

  return (
    <div className="renewal-banner warning" role="alert">
      <strong>
        {upcoming.length} subscription{upcoming.length === 1 ? '' : 's'} will renew within {warningDays} days
      </strong>
      <ul>
        {upcoming.map((s) => (
          <li key={s.id}>
            {s.name}: {formatCurrency(s.amount, s.currency)} {describeDays(s.daysRemaining)}
          </li>
        ))}
      </ul>
    </div>
  );
}
