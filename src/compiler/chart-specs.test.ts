import { describe, it, expect } from 'vitest';
import { renderCharts, resolveChartSpecs } from './chart-specs.js';
import { compile } from './compile.js';
import { newCollection } from '../collection/collection.js';
import { addLayout, addText, addViz } from '../collection/helpers.js';
import type { ChartBackend } from '../types/compiled.js';
import type { VizType } from '../types/content.js';

function sampleUnit() {
  let children = addViz(newCollection(), { vizType: 'scatter', xVar: 'age', yVar: 'income' });
  children = addText(children, 'caption');
  let c = addViz(newCollection(), { vizType: 'histogram', xVar: 'age', filter: 'wave == 2' });
  c = addLayout(c, 'row', children);
  return compile(c).units[0];
}

describe('resolveChartSpecs', () => {
  it('lists viz items, nested ones included, in page order', () => {
    const specs = resolveChartSpecs(sampleUnit());

    expect(specs.map((s) => [s.chunkName, s.item.vizType, s.data.type])).toEqual([
      ['histogram-age', 'histogram', 'filtered'],
      ['scatter-age-income', 'scatter', 'raw'],
    ]);
  });
});

describe('renderCharts', () => {
  it('renders supported viz types keyed by chunk name', () => {
    const supported = new Set<VizType>(['histogram']);
    const backend: ChartBackend<string> = {
      name: 'test-backend',
      supports: (vizType) => supported.has(vizType),
      renderChart: (viz) => `${viz.item.vizType}(${viz.item.xVar ?? ''})`,
    };

    expect(renderCharts(sampleUnit(), backend)).toEqual({ 'histogram-age': 'histogram(age)' });
  });
});
