import type { ChartBackend, CompiledUnit, NamedItem, ResolvedVizItem } from '../types/compiled.js';

/**
 * Every viz item of a unit, nested ones included, in page order.
 */
export function resolveChartSpecs(unit: CompiledUnit): ResolvedVizItem[] {
  const resolved: ResolvedVizItem[] = [];
  const visit = (items: readonly NamedItem[]): void => {
    for (const named of items) {
      const { item, data } = named;
      if (item.kind === 'viz' && data !== null) {
        resolved.push({ chunkName: named.chunkName, item, data, visibility: named.visibility });
      }
      visit(named.children);
    }
  };
  visit(unit.items);
  return resolved;
}

/**
 * Render a unit's charts with a backend, keyed by chunk name.
 *
 * Viz types the backend does not support are left out.
 */
export function renderCharts<Output>(unit: CompiledUnit, backend: ChartBackend<Output>): Record<string, Output> {
  const charts: Record<string, Output> = {};
  for (const viz of resolveChartSpecs(unit)) {
    if (backend.supports(viz.item.vizType)) {
      charts[viz.chunkName] = backend.renderChart(viz);
    }
  }
  return charts;
}
