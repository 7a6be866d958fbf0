import { describe, it, expect } from 'vitest';
import { excerpt, renderReport, reportRows, summaryLine } from '../../../src/ui/report.js';
import type { RunReport } from '../../../src/types/plan.js';
import { registryFrom } from '../helpers.js';

const registry = registryFrom(`
components:
  - { id: git, name: Git, install_action: "true" }
  - { id: go, name: Go, install_action: "true" }
  - { id: lazygit, name: Lazygit, install_action: "true" }
  - { id: tmux, name: Tmux, install_action: "true" }
  - { id: fonts, name: Fonts, install_action: "true" }
`);

const report: RunReport = {
  status: 'failed',
  cancelled: false,
  startedAt: '2026-03-01T09:15:30.250Z',
  finishedAt: '2026-03-01T09:16:02.000Z',
  counts: { skipped: 1, succeeded: 2, failed: 1, aborted: 1 },
  results: [
    { id: 'git', status: 'skipped', probe: 'satisfied', exitCode: null, output: '', durationMs: 3 },
    { id: 'go', status: 'succeeded', probe: 'bypassed', exitCode: 0, output: 'ok', durationMs: 30 },
    { id: 'lazygit', status: 'failed', probe: 'unsatisfied', exitCode: 1, output: 'fetching\nboom\n', reason: 'exited with code 1', durationMs: 9 },
    { id: 'tmux', status: 'aborted', probe: 'none', exitCode: null, output: '', durationMs: 0 },
    { id: 'fonts', status: 'succeeded', probe: 'none', exitCode: 0, output: '', durationMs: 4 },
  ],
};

describe('excerpt', () => {
  it('keeps the last non-empty lines', () => {
    expect(excerpt('l1\nl2\n\nl3\nl4\r\nl5\nl6\n')).toBe('l2\nl3\nl4\nl5\nl6');
  });

  it('cuts long lines to the width', () => {
    expect(excerpt('abcdef', 5, 4)).toBe('abc…');
    expect(excerpt('abcd', 5, 4)).toBe('abcd');
  });

  it('returns an empty string for blank output', () => {
    expect(excerpt('\n  \n')).toBe('');
  });
});

describe('reportRows', () => {
  it('describes each component in registry order', () => {
    expect(reportRows(report, registry)).toEqual([
      ['Git', 'skipped', 'already satisfied'],
      ['Go', 'succeeded', 'installed (check bypassed)'],
      ['Lazygit', 'failed', 'exited with code 1\nfetching\nboom'],
      ['Tmux', 'aborted', 'not attempted'],
      ['Fonts', 'succeeded', 'installed'],
    ]);
  });
});

describe('summaryLine', () => {
  it('counts every status', () => {
    expect(summaryLine(report)).toBe('2 succeeded, 1 skipped, 1 failed, 1 aborted');
    expect(summaryLine({ ...report, cancelled: true })).toBe(
      '2 succeeded, 1 skipped, 1 failed, 1 aborted (cancelled)',
    );
  });
});

describe('renderReport', () => {
  it('ends with the summary line', () => {
    const lines = renderReport(report, registry).split('\n');
    expect(lines[lines.length - 1]).toBe('2 succeeded, 1 skipped, 1 failed, 1 aborted');
  });
});
