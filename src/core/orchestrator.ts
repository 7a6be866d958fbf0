import { envVar } from '../config/branding.js';
import type {
  ExecutionPlan,
  ExecutionResult,
  ProbeOutcome,
  RunReport,
  TerminalStatus,
} from '../types/plan.js';
import type { Component, ComponentId, Registry } from '../types/registry.js';
import { ResultStore, isSatisfied, isTerminal } from './results.js';
import { spawnAction, type ActionRunner } from './runner.js';

export const DEFAULT_CONCURRENCY = 2;
export const DEFAULT_GRACE_MS = 5000;
export const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

export type RunEvent =
  | { type: 'probe'; id: ComponentId }
  | { type: 'start'; id: ComponentId }
  | { type: 'finish'; result: ExecutionResult };

export interface RunOptions {
  /** Run install actions even when the check command reports success. */
  force?: boolean;
  /** Stop dispatching after the first failure. */
  failFast?: boolean;
  concurrency?: number;
  graceMs?: number;
  /** Default for components without their own `timeout`; 0 disables it. */
  installTimeoutMs?: number;
  probeTimeoutMs?: number;
  signal?: AbortSignal;
  /** Base environment for actions. Defaults to the current process environment. */
  env?: Record<string, string>;
  /** Exported to actions as RIGUP_REPO_ROOT; defaults to the registry directory. */
  repoRoot?: string;
  runner?: ActionRunner;
  onEvent?: (event: RunEvent) => void;
}

export function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/**
 * Runs `worker` over `items` with at most `limit` in flight. Items are
 * taken in order; completion order is unconstrained.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      await worker(item);
    }
  };
  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
}

function countStatuses(results: ExecutionResult[]): Record<TerminalStatus, number> {
  const counts: Record<TerminalStatus, number> = { skipped: 0, succeeded: 0, failed: 0, aborted: 0 };
  for (const result of results) {
    if (isTerminal(result.status)) counts[result.status] += 1;
  }
  return counts;
}

export async function runPlan(
  plan: ExecutionPlan,
  registry: Registry,
  options: RunOptions = {},
): Promise<RunReport> {
  const startedAt = new Date();
  const runner = options.runner ?? spawnAction;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
  const probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const baseEnv = options.env ?? inheritedEnv();
  const store = new ResultStore(plan.steps.map((s) => s.id));
  const emit = options.onEvent ?? (() => undefined);
  let failureSeen = false;

  const haltReason = (): string | undefined => {
    if (options.signal?.aborted) return 'run cancelled';
    if (options.failFast && failureSeen) return 'stopped after an earlier failure (fail-fast)';
    return undefined;
  };

  const actionEnv = (component: Component): Record<string, string> => ({
    ...baseEnv,
    [envVar('COMPONENT')]: component.id,
    [envVar('REPO_ROOT')]: options.repoRoot ?? registry.baseDir,
    [envVar('AUTOMATED')]: '1',
    [envVar('FORCE')]: options.force ? '1' : '0',
    ...component.env,
  });

  const settle = (id: ComponentId, status: TerminalStatus, details: Partial<ExecutionResult>): void => {
    if (status === 'failed') failureSeen = true;
    emit({ type: 'finish', result: store.transition(id, status, details) });
  };

  const execute = async (component: Component): Promise<void> => {
    const { id } = component;
    const blocking = component.dependsOn.filter((dep) => !isSatisfied(store.status(dep)));
    if (blocking.length > 0) {
      const detail = blocking.map((dep) => `${dep} ${store.status(dep)}`).join(', ');
      settle(id, 'aborted', { reason: `dependency not satisfied: ${detail}` });
      return;
    }
    const halted = haltReason();
    if (halted) {
      settle(id, 'aborted', { reason: halted });
      return;
    }

    const started = Date.now();
    const env = actionEnv(component);
    const request = { cwd: registry.baseDir, env, signal: options.signal, graceMs };
    let probe: ProbeOutcome = 'none';

    if (component.check && options.force) {
      probe = 'bypassed';
    } else if (component.check) {
      emit({ type: 'probe', id });
      const outcome = await runner({ ...request, action: component.check, timeoutMs: probeTimeoutMs });
      const durationMs = Date.now() - started;
      if (outcome.terminated) {
        settle(id, 'aborted', { probe: 'error', reason: 'run cancelled', durationMs });
        return;
      }
      if (outcome.error) {
        settle(id, 'failed', {
          probe: 'error',
          exitCode: outcome.exitCode,
          output: outcome.output,
          reason: `check command failed: ${outcome.error}`,
          durationMs,
        });
        return;
      }
      if (outcome.exitCode === 0) {
        settle(id, 'skipped', { probe: 'satisfied', durationMs });
        return;
      }
      probe = 'unsatisfied';

      const haltedAfterProbe = haltReason();
      if (haltedAfterProbe) {
        settle(id, 'aborted', { probe, reason: haltedAfterProbe, durationMs });
        return;
      }
    }

    store.transition(id, 'running', { probe });
    emit({ type: 'start', id });
    const timeoutMs = component.timeout ? component.timeout * 1000 : options.installTimeoutMs;
    const outcome = await runner({ ...request, action: component.install, timeoutMs });
    const succeeded = outcome.exitCode === 0 && !outcome.error;
    settle(id, succeeded ? 'succeeded' : 'failed', {
      exitCode: outcome.exitCode,
      output: outcome.output,
      reason: succeeded ? undefined : (outcome.error ?? `exited with code ${outcome.exitCode}`),
      durationMs: Date.now() - started,
    });
  };

  const guarded = async (id: ComponentId): Promise<void> => {
    const component = registry.byId.get(id);
    if (!component) {
      settle(id, 'failed', { reason: 'component missing from registry' });
      return;
    }
    try {
      await execute(component);
    } catch (err) {
      const status = store.status(id);
      if (status !== 'pending' && status !== 'running') throw err;
      settle(id, 'failed', { reason: `internal error: ${String(err)}` });
    }
  };

  for (const layer of plan.layers) {
    await runPool(layer, concurrency, guarded);
  }

  const results = store.list(registry.components.map((c) => c.id));
  const counts = countStatuses(results);
  return {
    status: counts.failed > 0 || counts.aborted > 0 ? 'failed' : 'succeeded',
    cancelled: options.signal?.aborted ?? false,
    results,
    counts,
    startedAt: startedAt.toISOString(),
    finishedAt: new Date().toISOString(),
  };
}
