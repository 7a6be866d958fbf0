import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { RunReport } from '../types/plan.js';
import type { Registry } from '../types/registry.js';
import { ensureDir } from '../utils/fs.js';
import { DISPLAY_NAME } from '../config/branding.js';

export function formatRunLog(report: RunReport, registry: Registry): string {
  const lines = [
    `${DISPLAY_NAME} install log`,
    '='.repeat(50),
    `Registry: ${registry.source}`,
    `Started:  ${report.startedAt}`,
    `Finished: ${report.finishedAt}`,
    `Status:   ${report.status}${report.cancelled ? ' (cancelled)' : ''}`,
    '',
  ];

  for (const result of report.results) {
    const name = registry.byId.get(result.id)?.name ?? result.id;
    lines.push(`Component: ${name} [${result.id}]`);
    lines.push(`Status: ${result.status}`);
    lines.push(`Probe: ${result.probe}`);
    if (result.exitCode !== null) lines.push(`Exit code: ${result.exitCode}`);
    if (result.reason) lines.push(`Reason: ${result.reason}`);
    lines.push(`Duration: ${result.durationMs}ms`);
    if (result.output) {
      lines.push('Output:');
      lines.push(result.output.trimEnd());
    }
    lines.push('');
  }
  return lines.join('\n');
}

/** Writes the log under `dir` and returns its path. */
export function writeRunLog(report: RunReport, registry: Registry, dir: string): string {
  ensureDir(dir);
  const stamp = report.startedAt.replace(/[:.]/g, '-');
  const path = join(dir, `install-${stamp}.log`);
  writeFileSync(path, formatRunLog(report, registry), 'utf-8');
  return path;
}
