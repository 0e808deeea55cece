// Barrel exports for running builds

export { runBuild } from './build-runner.js';
export type { BuildRunOptions, BuildResult, DocumentRenderer, RenderUnit } from './build-runner.js';
export { JsonPlanWriter } from './json-plan-writer.js';
export type { JsonPlanWriterOptions } from './json-plan-writer.js';
export { BuildAbortedError } from './errors.js';
