import { describe, it, expect } from 'vitest';
import { buildGraph } from '../../../src/core/graph.js';
import { buildPlan } from '../../../src/core/planner.js';
import { runPlan, runPool, type RunEvent } from '../../../src/core/orchestrator.js';
import { CyclicDependencyError } from '../../../src/core/errors.js';
import type { Registry } from '../../../src/types/registry.js';
import { BASE_DIR, CHAIN_REGISTRY, fakeRunner, registryFrom } from '../helpers.js';

function planFor(registry: Registry, selection: string[]) {
  return buildPlan(buildGraph(registry), selection);
}

const PROBED = `
components:
  - id: dependencies
    name: Dependencies
    check_command: check dependencies
    install_action: install dependencies
  - id: neovim
    name: Neovim
    depends_on: [dependencies]
    check_command: check neovim
    install_action: install neovim
`;

const INDEPENDENT = `
components:
  - { id: a, name: A, install_action: install a }
  - { id: b, name: B, install_action: install b }
  - { id: c, name: C, install_action: install c }
  - { id: d, name: D, install_action: install d }
`;

function statuses(results: { id: string; status: string }[]): Record<string, string> {
  return Object.fromEntries(results.map((r) => [r.id, r.status]));
}

describe('runPool', () => {
  it('never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];
    await runPool([1, 2, 3, 4, 5], 2, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      seen.push(n);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
    });
    expect(peak).toBe(2);
    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it('handles an empty list', async () => {
    await expect(runPool([], 3, async () => undefined)).resolves.toBeUndefined();
  });
});

describe('runPlan', () => {
  it('installs a dependency before its dependent', async () => {
    const registry = registryFrom(PROBED);
    const { runner, calls } = fakeRunner((script) => (script.startsWith('check') ? { exitCode: 1 } : undefined));

    const report = await runPlan(planFor(registry, ['neovim']), registry, { runner, env: {} });

    expect(calls).toEqual(['check dependencies', 'install dependencies', 'check neovim', 'install neovim']);
    expect(report.status).toBe('succeeded');
    expect(report.cancelled).toBe(false);
    expect(report.counts).toEqual({ skipped: 0, succeeded: 2, failed: 0, aborted: 0 });
    expect(report.results.map((r) => r.probe)).toEqual(['unsatisfied', 'unsatisfied']);
  });

  it('skips everything on a second run once probes pass', async () => {
    const registry = registryFrom(PROBED);
    const installed = new Set<string>();
    const { runner, calls } = fakeRunner((script) => {
      const [verb, id] = script.split(' ');
      if (verb === 'check') return { exitCode: installed.has(id) ? 0 : 1 };
      installed.add(id);
      return undefined;
    });
    const plan = planFor(registry, ['neovim']);

    await runPlan(plan, registry, { runner, env: {} });
    calls.length = 0;
    const second = await runPlan(plan, registry, { runner, env: {} });

    expect(calls).toEqual(['check dependencies', 'check neovim']);
    expect(statuses(second.results)).toEqual({ dependencies: 'skipped', neovim: 'skipped' });
    expect(second.status).toBe('succeeded');
  });

  it('runs the install despite a passing probe when forced', async () => {
    const registry = registryFrom(PROBED);
    const { runner, calls, requests } = fakeRunner();

    const report = await runPlan(planFor(registry, ['dependencies']), registry, {
      runner,
      env: {},
      force: true,
    });

    expect(calls).toEqual(['install dependencies']);
    expect(report.results[0]).toMatchObject({ status: 'succeeded', probe: 'bypassed' });
    expect(requests[0].env.RIGUP_FORCE).toBe('1');
  });

  it('aborts only the dependents of a failed component', async () => {
    const registry = registryFrom(CHAIN_REGISTRY);
    const { runner, calls } = fakeRunner((script) =>
      script === 'install a' ? { exitCode: 1, output: 'boom\n' } : undefined,
    );

    const report = await runPlan(planFor(registry, ['b', 'c']), registry, { runner, env: {} });

    expect(calls).toEqual(['install a', 'install c']);
    expect(report.results).toEqual([
      expect.objectContaining({ id: 'a', status: 'failed', exitCode: 1, output: 'boom\n', reason: 'exited with code 1' }),
      expect.objectContaining({ id: 'b', status: 'aborted', reason: 'dependency not satisfied: a failed' }),
      expect.objectContaining({ id: 'c', status: 'succeeded', exitCode: 0 }),
    ]);
    expect(report.status).toBe('failed');
  });

  it('stops dispatching after the first failure in fail-fast mode', async () => {
    const registry = registryFrom(INDEPENDENT);
    const { runner, calls } = fakeRunner((script) => (script === 'install a' ? { exitCode: 2 } : undefined));

    const report = await runPlan(planFor(registry, ['a', 'b', 'c', 'd']), registry, {
      runner,
      env: {},
      failFast: true,
      concurrency: 1,
    });

    expect(calls).toEqual(['install a']);
    expect(statuses(report.results)).toEqual({ a: 'failed', b: 'aborted', c: 'aborted', d: 'aborted' });
    expect(report.results[1].reason).toBe('stopped after an earlier failure (fail-fast)');
  });

  it('lets running components finish in fail-fast mode', async () => {
    const registry = registryFrom(INDEPENDENT);
    const { runner, calls } = fakeRunner((script) => {
      if (script === 'install a') return { exitCode: 1 };
      if (script === 'install b') return { delayMs: 20 };
      return undefined;
    });

    const report = await runPlan(planFor(registry, ['a', 'b', 'c']), registry, {
      runner,
      env: {},
      failFast: true,
      concurrency: 2,
    });

    expect(calls).toEqual(['install a', 'install b']);
    expect(statuses(report.results)).toEqual({ a: 'failed', b: 'succeeded', c: 'aborted' });
  });

  it('records a probe that cannot run as a failure', async () => {
    const registry = registryFrom(PROBED);
    const { runner, calls } = fakeRunner((script) =>
      script === 'check dependencies' ? { exitCode: null, error: 'timed out after 30000ms' } : undefined,
    );

    const report = await runPlan(planFor(registry, ['neovim']), registry, { runner, env: {} });

    expect(calls).toEqual(['check dependencies']);
    expect(report.results).toEqual([
      expect.objectContaining({
        id: 'dependencies',
        status: 'failed',
        probe: 'error',
        reason: 'check command failed: timed out after 30000ms',
      }),
      expect.objectContaining({ id: 'neovim', status: 'aborted', probe: 'none' }),
    ]);
  });

  it('aborts undispatched components when cancelled', async () => {
    const registry = registryFrom(CHAIN_REGISTRY);
    const controller = new AbortController();
    const { runner, calls } = fakeRunner((script) => {
      if (script === 'install a') controller.abort();
      return undefined;
    });

    const report = await runPlan(planFor(registry, ['b', 'c']), registry, {
      runner,
      env: {},
      concurrency: 1,
      signal: controller.signal,
    });

    expect(calls).toEqual(['install a']);
    expect(report.results).toEqual([
      expect.objectContaining({ id: 'a', status: 'succeeded' }),
      expect.objectContaining({ id: 'b', status: 'aborted', reason: 'run cancelled' }),
      expect.objectContaining({ id: 'c', status: 'aborted', reason: 'run cancelled' }),
    ]);
    expect(report.cancelled).toBe(true);
    expect(report.status).toBe('failed');
  });

  it('records an action terminated after cancellation as failed', async () => {
    const registry = registryFrom(CHAIN_REGISTRY);
    const { runner } = fakeRunner((script) =>
      script === 'install c'
        ? { exitCode: null, terminated: true, error: 'terminated after cancellation' }
        : undefined,
    );

    const report = await runPlan(planFor(registry, ['c']), registry, { runner, env: {} });

    expect(report.results).toEqual([
      expect.objectContaining({ id: 'c', status: 'failed', reason: 'terminated after cancellation' }),
    ]);
  });

  it('waits for a whole layer before starting the next', async () => {
    const registry = registryFrom(CHAIN_REGISTRY);
    const events: string[] = [];
    const { runner } = fakeRunner((script) => (script === 'install c' ? { delayMs: 15 } : undefined));
    const onEvent = (event: RunEvent): void => {
      events.push(event.type === 'finish' ? `finish ${event.result.id}` : `${event.type} ${event.id}`);
    };

    await runPlan(planFor(registry, ['b', 'c']), registry, { runner, env: {}, onEvent });

    expect(events.indexOf('start b')).toBeGreaterThan(events.indexOf('finish c'));
    expect(events.indexOf('start b')).toBeGreaterThan(events.indexOf('finish a'));
  });

  it('bounds concurrency within a layer', async () => {
    const registry = registryFrom(INDEPENDENT);
    let inFlight = 0;
    let peak = 0;
    const runner = async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return { exitCode: 0, output: '', timedOut: false, terminated: false, durationMs: 5 };
    };

    await runPlan(planFor(registry, ['a', 'b', 'c', 'd']), registry, { runner, env: {}, concurrency: 3 });

    expect(peak).toBe(3);
  });

  it('emits probe, start and finish for a probed install', async () => {
    const registry = registryFrom(PROBED);
    const events: RunEvent[] = [];
    const { runner } = fakeRunner((script) => (script.startsWith('check') ? { exitCode: 1 } : undefined));

    await runPlan(planFor(registry, ['dependencies']), registry, {
      runner,
      env: {},
      onEvent: (event) => events.push(event),
    });

    expect(events.map((e) => e.type)).toEqual(['probe', 'start', 'finish']);
  });

  it('passes the component environment and timeouts to actions', async () => {
    const registry = registryFrom(`
components:
  - id: go
    name: Go
    install_action: install go
    timeout: 120
    env:
      GO_VERSION: "1.22"
  - id: fonts
    name: Fonts
    check_command: check fonts
    install_action: install fonts
`);
    const { runner, requests } = fakeRunner((script) => (script === 'check fonts' ? { exitCode: 1 } : undefined));

    await runPlan(planFor(registry, ['go', 'fonts']), registry, {
      runner,
      env: { PATH: '/usr/bin' },
      concurrency: 1,
      installTimeoutMs: 60_000,
      probeTimeoutMs: 5_000,
      graceMs: 100,
    });

    expect(requests.map((r) => r.timeoutMs)).toEqual([120_000, 5_000, 60_000]);
    expect(requests[0].cwd).toBe(BASE_DIR);
    expect(requests[0].graceMs).toBe(100);
    expect(requests[0].env).toEqual({
      PATH: '/usr/bin',
      RIGUP_COMPONENT: 'go',
      RIGUP_REPO_ROOT: BASE_DIR,
      RIGUP_AUTOMATED: '1',
      RIGUP_FORCE: '0',
      GO_VERSION: '1.22',
    });
    expect(requests[1].env.RIGUP_COMPONENT).toBe('fonts');
  });

  it('uses the given repository root', async () => {
    const registry = registryFrom(CHAIN_REGISTRY);
    const { runner, requests } = fakeRunner();

    await runPlan(planFor(registry, ['c']), registry, { runner, env: {}, repoRoot: '/home/dev/dotfiles' });

    expect(requests[0].env.RIGUP_REPO_ROOT).toBe('/home/dev/dotfiles');
  });

  it('runs nothing for a cyclic registry', () => {
    const { calls } = fakeRunner();
    const registry = registryFrom(`
components:
  - { id: a, name: A, depends_on: [b], install_action: install a }
  - { id: b, name: B, depends_on: [a], install_action: install b }
`);
    expect(() => planFor(registry, ['a', 'b'])).toThrow(CyclicDependencyError);
    expect(calls).toEqual([]);
  });
});
