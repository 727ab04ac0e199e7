import { useEffect, useMemo, useRef } from 'react';
import * as d3 from 'd3';
import { formatCurrency } from '../../domain/currency';
import type { CategoryTotal } from '../../domain/types';

interface CategoryDonutProps {
  categories: CategoryTotal[];
  baseCurrency: string;
}

const SIZE = 260;
const RADIUS = SIZE / 2;

export function CategoryDonut({ categories, baseCurrency }: CategoryDonutProps) {
  const svgRef = useRef<SVGSVGElement>(null);
  const slices = useMemo(() => categories.filter((c) => c.monthlyCost > 0), [categories]);

  useEffect(() => {
    if (!svgRef.current) return;
    const svg = d3.select(svgRef.current);
    svg.selectAll('*').remove();
    if (slices.length === 0) return;

    svg.attr('width', SIZE).attr('height', SIZE).attr('viewBox', `0 0 ${SIZE} ${SIZE}`);

    const colorScale = d3.scaleOrdinal<string>(d3.schemeTableau10).domain(slices.map((s) => s.category));
    const pie = d3
      .pie<CategoryTotal>()
      .value((d) => d.monthlyCost)
      .sort(null);
    const arc = d3
      .arc<d3.PieArcDatum<CategoryTotal>>()
      .innerRadius(RADIUS * 0.55)
      .outerRadius(RADIUS - 4);

    const g = svg.append('g').attr('transform', `translate(${RADIUS},${RADIUS})`);

    g.selectAll('path')
      .data(pie(slices))
      .join('path')
      .attr('d', arc)
      .attr('fill', (d) => colorScale(d.data.category))
      .attr('stroke', '#fff')
      .attr('stroke-width', 1)
      .append('title')
      .text((d) => `${d.data.category}: ${formatCurrency(d.data.monthlyCost, baseCurrency)} (${d.data.share}%)`);

    g.append('text')
      .attr('text-anchor', 'middle')
      .attr('dy', '0.35em')
      .attr('font-size', '14px')
      .text(formatCurrency(d3.sum(slices, (s) => s.monthlyCost), baseCurrency));
  }, [slices, baseCurrency]);

  if (slices.length === 0) {
    return (
      <section className="card" aria-label="Category share">
        <h3 className="card-title">Category share</h3>
        <p className="no-data">No recurring spend</p>
      </section>
    );
  }

  return (
    <section className="card" aria-label="Category share">
      <h3 className="card-title">Category share</h3>
      <div className="donut-wrap">
        <svg ref={svgRef} role="img" aria-label="Monthly spend by category" />
        <ul className="legend">
          {slices.map((s) => (
            <li key={s.category}>
              {s.category}: {s.share}%
            </li>
          ))}
        </ul>
      </div>
    </section>
  );
}
