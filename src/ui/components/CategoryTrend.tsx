import { formatCurrency } from '../../domain/currency';
import type { CategoryTrendPoint } from '../../domain/types';
import { formatMonth } from '../format';

interface CategoryTrendProps {
  categories: string[];
  category: string;
  points: CategoryTrendPoint[];
  baseCurrency: string;
  onCategoryChange: (category: string) => void;
}

export function CategoryTrend({ categories, category, points, baseCurrency, onCategoryChange }: CategoryTrendProps) {
  const peak = Math.max(0, ...points.map((p) => p.monthlyCost));

  return (
    <section className="card category-trend" aria-label="Category trend">
      <h3 className="card-title">Category trend</h3>
      <div className="form-row">
        <label htmlFor="trend-category">Category</label>
        <select id="trend-category" value={category} onChange={(e) => onCategoryChange(e.target.value)}>
          <option value="">Choose a category</option>
          {categories.map((c) => (
            <option key={c} value={c}>
              {c}
            </option>
          ))}
        </select>
      </div>

      {!category ? null : points.length === 0 ? (
        <p className="no-data">No snapshots recorded yet</p>
      ) : (
        <ul className="category-list">
          {points.map((p) => (
            <li key={p.date} className="category-row" data-testid={`trend-${p.date}`}>
              <div className="category-row-header">
                <span>{formatMonth(p.date)}</span>
                <span>{formatCurrency(p.monthlyCost, baseCurrency)}</span>
              </div>
              <div className="bar-track">
                <div className="bar-fill" style={{ width: `${peak > 0 ? (p.monthlyCost / peak) * 100 : 0}%` }} />
              </div>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
