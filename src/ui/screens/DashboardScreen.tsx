import type { ApiRates, ApiSummary } from '../../api/client';
import { CategorySpendList } from '../components/CategorySpendList';
import { CycleBars } from '../components/CycleBars';
import { EmptyState } from '../components/EmptyState';
import { ExportPanel } from '../components/ExportPanel';
import { KpiCards } from '../components/KpiCards';
import { RateStatusLine } from '../components/RateStatusLine';
import { RenewalBanner } from '../components/RenewalBanner';
import { TopSubscriptions } from '../components/TopSubscriptions';

export interface DashboardScreenProps {
  summary: ApiSummary;
  rates: ApiRates | null;
  refreshingRates: boolean;
  onRefreshRates: () => void;
}

export function DashboardScreen({ summary, rates, refreshingRates, onRefreshRates }: DashboardScreenProps) {
  const rateLine = <RateStatusLine rates={rates} refreshing={refreshingRates} onRefresh={onRefreshRates} />;

  if (summary.kpis.totalCount === 0) {
    return (
      <div className="screen-content dashboard-screen">
        {rateLine}
        <EmptyState />
      </div>
    );
  }

  return (
    <div className="screen-content dashboard-screen">
      {rateLine}
      <RenewalBanner upcoming={summary.upcoming} warningDays={summary.warningDays} />
      <KpiCards kpis={summary.kpis} baseCurrency={summary.baseCurrency} warningDays={summary.warningDays} />
      <div className="card-grid">
        <CategorySpendList categories={summary.categories} baseCurrency={summary.baseCurrency} />
        <CycleBars cycles={summary.cycles} baseCurrency={summary.baseCurrency} />
        <TopSubscriptions top={summary.top} baseCurrency={summary.baseCurrency} />
      </div>
      <ExportPanel />
    </div>
  );
}
