/**
 * Formatter for build results.
 *
 * Renders a build as:
 * - Terminal summary with one color-coded line per unit
 * - Machine-readable JSON
 */

import pc from 'picocolors';
import type { UnitStatus } from '../incremental/build-planner.js';
import type { BuildResult } from '../build/build-runner.js';

export interface BuildFormatOptions {
  /** List unchanged units too (default: false) */
  verbose?: boolean;
}

const STATUS_LABELS: Record<UnitStatus, string> = {
  new: 'NEW',
  changed: 'CHANGED',
  unchanged: 'UNCHANGED',
  removed: 'REMOVED',
  failed: 'FAILED',
};

function colorStatus(status: UnitStatus): string {
  const label = STATUS_LABELS[status];
  switch (status) {
    case 'new':
      return pc.green(label);
    case 'changed':
      return pc.cyan(label);
    case 'unchanged':
      return pc.dim(label);
    case 'removed':
      return pc.yellow(label);
    case 'failed':
      return pc.red(label);
  }
}

/**
 * Pad string to a minimum width (right-padded), ignoring ANSI codes.
 */
function pad(str: string, width: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

export class BuildReportFormatter {
  formatTerminal(result: BuildResult, options: BuildFormatOptions = {}): string {
    const { verbose = false } = options;
    const { counts } = result.plan;
    const lines: string[] = [];

    lines.push('');
    lines.push(pc.bold('Build'));
    lines.push('═'.repeat(60));

    for (const decision of result.plan.decisions) {
      if (decision.status === 'unchanged' && !verbose) continue;
      const hash = decision.contentHash ?? decision.previousHash;
      lines.push(
        pad(colorStatus(decision.status), 12) +
        pad(decision.unitId, 32) +
        pc.dim(hash !== null ? hash.slice(0, 12) : '-'),
      );
    }

    if (result.diagnostics.length > 0) {
      lines.push(pc.dim('─'.repeat(60)));
      for (const diagnostic of result.diagnostics) {
        const marker = diagnostic.level === 'error' ? pc.red('✖') : pc.yellow('⚠');
        lines.push(`${marker} ${diagnostic.unitId}: ${diagnostic.message}`);
      }
    }

    if (result.manifestStatus === 'recovered') {
      lines.push(pc.yellow('Build manifest was unreadable; every unit was rebuilt'));
    }

    lines.push(pc.dim('─'.repeat(60)));
    lines.push(
      `${counts.new} new, ${counts.changed} changed, ${counts.unchanged} unchanged, ` +
      `${counts.removed} removed, ${counts.failed} failed`,
    );
    lines.push('');

    return lines.join('\n');
  }

  formatJSON(result: BuildResult): string {
    return JSON.stringify(
      {
        summary: result.plan.counts,
        manifestStatus: result.manifestStatus,
        units: result.plan.decisions,
        rendered: result.rendered,
        removed: result.removed,
        failedPages: result.failedPages,
        diagnostics: result.diagnostics,
      },
      null,
      2,
    );
  }
}
