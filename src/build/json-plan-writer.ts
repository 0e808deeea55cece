/**
 * Reference renderer: writes each unit's render plan as JSON.
 *
 * `<outputDir>/<unitId>.json` holds the named items, the tab structure
 * (by chunk name), filtered views and navigation. With a chart backend,
 * its output for every supported viz item is included under `charts`.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { renderCharts } from '../compiler/chart-specs.js';
import { mapTabs } from '../tabs/group-tree.js';
import type { ChartBackend } from '../types/compiled.js';
import type { DocumentRenderer, RenderUnit } from './build-runner.js';

export interface JsonPlanWriterOptions {
  outputDir: string;
  chartBackend?: ChartBackend;
}

export class JsonPlanWriter implements DocumentRenderer {
  private readonly outputDir: string;
  private readonly chartBackend: ChartBackend | undefined;

  constructor(options: JsonPlanWriterOptions) {
    this.outputDir = options.outputDir;
    this.chartBackend = options.chartBackend;
  }

  pathFor(unitId: string): string {
    return join(this.outputDir, `${unitId}.json`);
  }

  /** The JSON written for a unit. */
  planFor(unit: RenderUnit): Record<string, unknown> {
    const plan: Record<string, unknown> = {
      unitId: unit.unitId,
      status: unit.status,
      pageIndex: unit.pageIndex,
      pageCount: unit.pageCount,
      contentHash: unit.contentHash,
      navigation: unit.navigation,
      datasets: unit.datasets,
      views: unit.views,
      items: unit.items,
      tabs: mapTabs(unit.tabs, (named) => named.chunkName).entries,
    };
    if (this.chartBackend !== undefined) {
      plan.chartBackend = this.chartBackend.name;
      plan.charts = renderCharts(unit, this.chartBackend);
    }
    return plan;
  }

  async render(unit: RenderUnit): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await writeFile(this.pathFor(unit.unitId), JSON.stringify(this.planFor(unit), null, 2) + '\n', 'utf-8');
  }

  async remove(unitId: string): Promise<void> {
    await rm(this.pathFor(unitId), { force: true });
  }
}
