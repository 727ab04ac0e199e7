import { formatCurrency } from '../../domain/currency';
import type { DashboardKpis } from '../../domain/types';

interface KpiCardsProps {
  kpis: DashboardKpis;
  baseCurrency: string;
  warningDays: number;
}

export function KpiCards({ kpis, baseCurrency, warningDays }: KpiCardsProps) {
  const cards = [
    { key: 'count', label: 'Subscriptions', value: String(kpis.totalCount), hint: `${kpis.activeCount} active` },
    { key: 'monthly', label: 'Monthly spend', value: formatCurrency(kpis.monthlyTotal, baseCurrency), hint: 'normalised per month' },
    { key: 'yearly', label: 'Yearly estimate', value: formatCurrency(kpis.yearlyEstimate, baseCurrency), hint: 'monthly × 12' },
    {
      key: 'warnings',
      label: 'Renewing soon',
      value: String(kpis.warningCount),
      hint: `auto-renew within ${warningDays} days`,
    },
  ];

  return (
    <div className="kpi-grid">
      {cards.map((card) => (
        <div
          key={card.key}
          className={`kpi-card ${card.key === 'warnings' && kpis.warningCount > 0 ? 'warning' : ''}`}
          data-testid={`kpi-${card.key}`}
        >
          <div className="kpi-label">{card.label}</div>
          <div className="kpi-value">{card.value}</div>
          <div className="kpi-hint">{card.hint}</div>
        </div>
      ))}
    </div>
  );
}
