import chalk from 'chalk';
import type { ExecutionResult, RunReport, TerminalStatus } from '../types/plan.js';
import type { Registry } from '../types/registry.js';
import { isTerminal } from '../core/results.js';
import { renderTable } from './table.js';

const EXCERPT_LINES = 5;
const EXCERPT_WIDTH = 100;

const STATUS_COLORS: Record<TerminalStatus, (text: string) => string> = {
  succeeded: chalk.green,
  skipped: chalk.cyan,
  failed: chalk.red,
  aborted: chalk.yellow,
};

/** The last few non-empty lines of `output`, each cut to a fixed width. */
export function excerpt(output: string, maxLines = EXCERPT_LINES, width = EXCERPT_WIDTH): string {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .slice(-maxLines)
    .map((line) => (line.length > width ? `${line.slice(0, width - 1)}…` : line))
    .join('\n');
}

function detailFor(result: ExecutionResult): string {
  switch (result.status) {
    case 'skipped':
      return 'already satisfied';
    case 'succeeded':
      return result.probe === 'bypassed' ? 'installed (check bypassed)' : 'installed';
    case 'failed': {
      const tail = excerpt(result.output);
      const reason = result.reason ?? 'failed';
      return tail ? `${reason}\n${tail}` : reason;
    }
    case 'aborted':
      return result.reason ?? 'not attempted';
    default:
      return result.status;
  }
}

/** One row per component, registry order: name, status, detail. */
export function reportRows(report: RunReport, registry: Registry): string[][] {
  return report.results.map((result) => [
    registry.byId.get(result.id)?.name ?? result.id,
    result.status,
    detailFor(result),
  ]);
}

export function summaryLine(report: RunReport): string {
  const { succeeded, skipped, failed, aborted } = report.counts;
  const parts = [
    `${succeeded} succeeded`,
    `${skipped} skipped`,
    `${failed} failed`,
    `${aborted} aborted`,
  ];
  return `${parts.join(', ')}${report.cancelled ? ' (cancelled)' : ''}`;
}

export function renderReport(report: RunReport, registry: Registry): string {
  const rows = reportRows(report, registry).map(([name, status, detail], index) => {
    const result = report.results[index];
    const color = isTerminal(result.status) ? STATUS_COLORS[result.status] : chalk.reset;
    return [name, color(status), detail];
  });
  return `${renderTable(['Component', 'Status', 'Detail'], rows)}\n${summaryLine(report)}`;
}
