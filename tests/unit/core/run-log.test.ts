import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { formatRunLog, writeRunLog } from '../../../src/core/run-log.js';
import type { RunReport } from '../../../src/types/plan.js';
import { CHAIN_REGISTRY, registryFrom } from '../helpers.js';

const registry = registryFrom(CHAIN_REGISTRY);

const report: RunReport = {
  status: 'failed',
  cancelled: false,
  startedAt: '2026-03-01T09:15:30.250Z',
  finishedAt: '2026-03-01T09:16:02.000Z',
  counts: { skipped: 0, succeeded: 1, failed: 1, aborted: 1 },
  results: [
    { id: 'a', status: 'failed', probe: 'none', exitCode: 1, output: 'fetching\nboom\n', reason: 'exited with code 1', durationMs: 40 },
    { id: 'b', status: 'aborted', probe: 'none', exitCode: null, output: '', reason: 'dependency not satisfied: a failed', durationMs: 0 },
    { id: 'c', status: 'succeeded', probe: 'none', exitCode: 0, output: '', durationMs: 12 },
  ],
};

describe('formatRunLog', () => {
  it('writes a section per component', () => {
    const lines = formatRunLog(report, registry).split('\n');
    expect(lines.slice(0, 7)).toEqual([
      'Rigup install log',
      '='.repeat(50),
      'Registry: test.yaml',
      'Started:  2026-03-01T09:15:30.250Z',
      'Finished: 2026-03-01T09:16:02.000Z',
      'Status:   failed',
      '',
    ]);
    expect(lines.slice(7, 17)).toEqual([
      'Component: A [a]',
      'Status: failed',
      'Probe: none',
      'Exit code: 1',
      'Reason: exited with code 1',
      'Duration: 40ms',
      'Output:',
      'fetching',
      'boom',
      '',
    ]);
    expect(lines.slice(17, 23)).toEqual([
      'Component: B [b]',
      'Status: aborted',
      'Probe: none',
      'Reason: dependency not satisfied: a failed',
      'Duration: 0ms',
      '',
    ]);
  });

  it('marks a cancelled run', () => {
    const text = formatRunLog({ ...report, cancelled: true }, registry);
    expect(text.split('\n')[5]).toBe('Status:   failed (cancelled)');
  });
});

describe('writeRunLog', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rigup-log-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names the file after the start time', () => {
    const path = writeRunLog(report, registry, join(dir, 'logs'));
    expect(path).toBe(join(dir, 'logs', 'install-2026-03-01T09-15-30-250Z.log'));
    expect(readFileSync(path, 'utf-8')).toBe(formatRunLog(report, registry));
  });
});
