import { useEffect, useRef } from 'react';
import * as d3 from 'd3';
import { sankey, sankeyLinkHorizontal, type SankeyGraph } from 'd3-sankey';
import { formatCurrency } from '../../domain/currency';
import type { CostFlow, CostFlowNode } from '../../domain/types';

interface CostFlowSankeyProps {
  flow: CostFlow;
  baseCurrency: string;
}

type FlowNode = { name: string; kind: CostFlowNode['kind'] };

// Category the link belongs to, for colouring
type FlowLink = { category: string };

function toGraph(flow: CostFlow): SankeyGraph<FlowNode, FlowLink> {
  const categoryOf = (index: number): string => {
    const node = flow.nodes[index];
    if (!node) return '';
    if (node.kind === 'category') return node.name;
    const parent = flow.links.find((l) => l.target === index);
    return parent ? categoryOf(parent.source) : node.name;
  };

  return {
    nodes: flow.nodes.map((n) => ({ name: n.name, kind: n.kind })),
    links: flow.links.map((l) => ({ source: l.source, target: l.target, value: l.value, category: categoryOf(l.target) })),
  };
}

export function CostFlowSankey({ flow, baseCurrency }: CostFlowSankeyProps) {
  const svgRef = useRef<SVGSVGElement>(null);

  useEffect(() => {
    if (!svgRef.current) return;
    const svgRoot = d3.select(svgRef.current);
    svgRoot.selectAll('*').remove();
    if (flow.links.length === 0) return;

    const leafCount = flow.nodes.filter((n) => n.kind === 'subscription').length;
    const width = 640;
    const height = Math.max(300, leafCount * 28);
    const margin = { top: 10, right: 160, bottom: 10, left: 80 };

    const svg = svgRoot.attr('width', width).attr('height', height).attr('viewBox', `0 0 ${width} ${height}`);

    const sankeyGenerator = sankey<FlowNode, FlowLink>()
      .nodeWidth(16)
      .nodePadding(10)
      .extent([
        [margin.left, margin.top],
        [width - margin.right, height - margin.bottom],
      ]);

    const { nodes, links } = sankeyGenerator(toGraph(flow));

    const colorScale = d3.scaleOrdinal<string>(d3.schemeTableau10);

    svg
      .append('g')
      .attr('class', 'links')
      .selectAll('path')
      .data(links)
      .join('path')
      .attr('d', sankeyLinkHorizontal())
      .attr('fill', 'none')
      .attr('stroke', (d) => colorScale(d.category))
      .attr('stroke-opacity', 0.45)
      .attr('stroke-width', (d) => Math.max(1, d.width ?? 0))
      .append('title')
      .text((d) => `${d.category}: ${formatCurrency(d.value, baseCurrency)}/mo`);

    svg
      .append('g')
      .attr('class', 'nodes')
      .selectAll('rect')
      .data(nodes)
      .join('rect')
      .attr('x', (d) => d.x0 ?? 0)
      .attr('y', (d) => d.y0 ?? 0)
      .attr('width', (d) => (d.x1 ?? 0) - (d.x0 ?? 0))
      .attr('height', (d) => (d.y1 ?? 0) - (d.y0 ?? 0))
      .attr('fill', (d) => (d.kind === 'total' ? '#555' : colorScale(d.name)));

    svg
      .append('g')
      .attr('class', 'labels')
      .selectAll('text')
      .data(nodes)
      .join('text')
      .attr('x', (d) => ((d.x0 ?? 0) < width / 2 ? (d.x0 ?? 0) - 6 : (d.x1 ?? 0) + 6))
      .attr('y', (d) => ((d.y0 ?? 0) + (d.y1 ?? 0)) / 2)
      .attr('dy', '0.35em')
      .attr('text-anchor', (d) => ((d.x0 ?? 0) < width / 2 ? 'end' : 'start'))
      .attr('font-size', '12px')
      .text((d) => `${d.name} ${formatCurrency(d.value ?? 0, baseCurrency)}`);
  }, [flow, baseCurrency]);

  if (flow.links.length === 0) {
    return (
      <section className="card sankey-diagram" aria-label="Cost flow">
        <h3 className="card-title">Cost flow</h3>
        <p className="no-data">No recurring spend</p>
      </section>
    );
  }

  return (
    <section className="card sankey-diagram" aria-label="Cost flow">
      <h3 className="card-title">Cost flow</h3>
      <svg ref={svgRef} role="img" aria-label="Monthly cost flow from total to categories to subscriptions" />
    </section>
  );
}
