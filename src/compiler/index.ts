// Barrel exports for the collection compiler

export { compile } from './compile.js';
export { resolveChartSpecs, renderCharts } from './chart-specs.js';
