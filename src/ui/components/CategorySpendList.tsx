import { formatCurrency } from '../../domain/currency';
import type { CategoryTotal } from '../../domain/types';

interface CategorySpendListProps {
  categories: CategoryTotal[];
  baseCurrency: string;
}

export function CategorySpendList({ categories, baseCurrency }: CategorySpendListProps) {
  return (
    <section className="card" aria-label="Spend by category">
      <h3 className="card-title">Spend by category</h3>
      {categories.length === 0 ? (
        <p className="no-data">No recurring spend</p>
      ) : (
        <ul className="category-list">
          {categories.map((c) => (
            <li key={c.category} className="category-row">
              <div className="category-row-header">
                <span className="category-name">{c.category}</span>
                <span className="category-amount">
                  {formatCurrency(c.monthlyCost, baseCurrency)} · {c.share}%
                </span>
              </div>
              <div className="bar-track">
                <div className="bar-fill" style={{ width: `${Math.min(c.share, 100)}%` }} />
              </div>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
