// Barrel exports for build reports

export { BuildReportFormatter } from './build-formatter.js';
export type { BuildFormatOptions } from './build-formatter.js';
