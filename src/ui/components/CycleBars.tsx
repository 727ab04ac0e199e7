import { formatCurrency } from '../../domain/currency';
import type { CycleTotal } from '../../domain/types';
import { CYCLE_LABELS } from '../format';

interface CycleBarsProps {
  cycles: CycleTotal[];
  baseCurrency: string;
  showCost?: boolean;
}

export function CycleBars({ cycles, baseCurrency, showCost = false }: CycleBarsProps) {
  const maxCount = Math.max(...cycles.map((c) => c.count), 1);
  const maxCost = Math.max(...cycles.map((c) => c.monthlyCost), 1);

  return (
    <section className="card" aria-label="Billing cycles">
      <h3 className="card-title">Billing cycles</h3>
      {cycles.length === 0 ? (
        <p className="no-data">No data</p>
      ) : (
        <ul className="cycle-bars">
          {cycles.map((c) => (
            <li key={c.cycle} className="cycle-row">
              <span className="cycle-label">{CYCLE_LABELS[c.cycle]}</span>
              <div className="bar-track">
                <div className="bar-fill count" style={{ width: `${(c.count / maxCount) * 100}%` }} />
              </div>
              <span className="cycle-count">
                {c.count} ({c.share}%)
              </span>
              {showCost && (
                <>
                  <div className="bar-track">
                    <div className="bar-fill cost" style={{ width: `${(c.monthlyCost / maxCost) * 100}%` }} />
                  </div>
                  <span className="cycle-cost">{formatCurrency(c.monthlyCost, baseCurrency)}/mo</span>
                </>
              )}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
