import type { Command } from 'commander';
import { addCommonOptions, loadContext, type CommonOptions } from './context.js';
import { resolveSelection } from '../core/registry.js';
import { inheritedEnv, runPool } from '../core/orchestrator.js';
import { spawnAction, type ActionRunner } from '../core/runner.js';
import { envVar } from '../config/branding.js';
import type { Component, Registry } from '../types/registry.js';
import { withSpinner } from '../ui/spinner.js';
import { printTable } from '../ui/table.js';
import { die } from '../ui/output.js';

interface StatusFlags extends CommonOptions {
  json?: boolean;
}

export type ProbeState = 'satisfied' | 'missing' | 'no-check' | 'error';

export interface ProbeStatus {
  id: string;
  name: string;
  state: ProbeState;
  detail?: string;
}

/** Runs every check command once; nothing is installed. */
export async function probeComponents(
  registry: Registry,
  components: readonly Component[],
  options: { concurrency: number; timeoutMs: number; runner?: ActionRunner },
): Promise<ProbeStatus[]> {
  const runner = options.runner ?? spawnAction;
  const env = inheritedEnv();
  const statuses = new Map<string, ProbeStatus>();

  await runPool(components, options.concurrency, async (component) => {
    const base = { id: component.id, name: component.name };
    if (!component.check) {
      statuses.set(component.id, { ...base, state: 'no-check' });
      return;
    }
    const outcome = await runner({
      action: component.check,
      cwd: registry.baseDir,
      env: { ...env, ...component.env, [envVar('COMPONENT')]: component.id },
      timeoutMs: options.timeoutMs,
      graceMs: 0,
    });
    if (outcome.error) {
      statuses.set(component.id, { ...base, state: 'error', detail: outcome.error });
    } else {
      statuses.set(component.id, {
        ...base,
        state: outcome.exitCode === 0 ? 'satisfied' : 'missing',
      });
    }
  });

  return components.flatMap((c) => {
    const status = statuses.get(c.id);
    return status ? [status] : [];
  });
}

export function registerStatus(program: Command): void {
  addCommonOptions(
    program
      .command('status')
      .description('Run check commands and show which components are satisfied')
      .argument('[components...]', 'Limit to these component ids or names')
      .option('--json', 'Output as JSON'),
  ).action(async (components: string[], opts: StatusFlags) => {
    try {
      const { registry, settings } = loadContext(opts);
      const ids = components.length > 0 ? new Set(resolveSelection(registry, components)) : null;
      const targets = registry.components.filter((c) => ids === null || ids.has(c.id));

      const statuses = await withSpinner('Checking components...', () =>
        probeComponents(registry, targets, {
          concurrency: settings.concurrency,
          timeoutMs: settings.probeTimeoutMs,
        }),
      );

      if (opts.json) {
        console.log(JSON.stringify(statuses, null, 2));
        return;
      }
      printTable(
        ['Id', 'Name', 'State'],
        statuses.map((s) => [s.id, s.name, s.detail ? `${s.state} (${s.detail})` : s.state]),
      );
    } catch (err) {
      die(err);
    }
  });
}
