import type { Command } from 'commander';
import { ExitPromptError } from '@inquirer/core';
import type { CommandContext, CommonOptions } from './context.js';
import { addCommonOptions, loadContext } from './context.js';
import { defaultSelection, resolveSelection } from '../core/registry.js';
import { buildPlan, formatPlan } from '../core/planner.js';
import { runPlan } from '../core/orchestrator.js';
import { writeRunLog } from '../core/run-log.js';
import { formatError } from '../core/errors.js';
import type { ComponentId } from '../types/registry.js';
import { resolveRepoRoot } from '../utils/git.js';
import { createStopSignalHandler } from '../utils/signals.js';
import { componentSelector } from '../ui/selector.js';
import { askConfirm } from '../ui/prompts.js';
import { createRunProgress } from '../ui/spinner.js';
import { renderReport } from '../ui/report.js';
import { die, info, ok, warn } from '../ui/output.js';

export interface RunFlags extends CommonOptions {
  force?: boolean;
  failFast?: boolean;
  concurrency?: string;
  gracePeriod?: string;
  timeout?: string;
  dryRun?: boolean;
  yes?: boolean;
  log?: boolean;
}

interface InstallFlags extends RunFlags {
  all?: boolean;
}

export function addRunOptions(cmd: Command): Command {
  return addCommonOptions(cmd)
    .option('-f, --force', 'Run install actions even when already satisfied')
    .option('--fail-fast', 'Stop scheduling after the first failure')
    .option('-c, --concurrency <n>', 'Maximum components installing at once')
    .option('--grace-period <seconds>', 'Time running actions get after an interrupt')
    .option('--timeout <seconds>', 'Default install action timeout (0 = none)')
    .option('--dry-run', 'Print the plan without running anything')
    .option('-y, --yes', 'Skip confirmation prompt')
    .option('--no-log', 'Do not write an install log');
}

async function selectInteractively(ctx: CommandContext): Promise<ComponentId[] | null> {
  try {
    return await componentSelector({
      message: 'Select components to install',
      registry: ctx.registry,
      graph: ctx.graph,
      preselected: defaultSelection(ctx.registry),
    });
  } catch (err) {
    if (err instanceof ExitPromptError) return null;
    throw err;
  }
}

export type SelectionRequest =
  | { kind: 'interactive' }
  | { kind: 'all' }
  | { kind: 'named'; inputs: string[] };

/** Shared by `install` and the bare interactive entry point. */
export async function installFlow(request: SelectionRequest, opts: RunFlags): Promise<void> {
  const ctx = loadContext(opts, {
    concurrency: opts.concurrency,
    fail_fast: opts.failFast,
    grace_period: opts.gracePeriod,
    install_timeout: opts.timeout,
  });
  const { registry, graph, settings } = ctx;

  let selection: ComponentId[];
  if (request.kind === 'interactive') {
    const chosen = await selectInteractively(ctx);
    if (chosen === null) {
      console.log('Cancelled.');
      return;
    }
    selection = chosen;
  } else if (request.kind === 'all') {
    selection = registry.components.map((c) => c.id);
  } else {
    selection = resolveSelection(registry, request.inputs);
  }

  if (selection.length === 0) {
    info('Nothing selected.');
    return;
  }

  const plan = buildPlan(graph, selection);
  console.log('\nInstall plan:\n');
  console.log(formatPlan(plan, registry));
  console.log('');

  if (opts.dryRun) return;

  if (!opts.yes && process.stdin.isTTY) {
    const confirmed = await askConfirm(`Install ${plan.steps.length} component(s)?`).catch(
      (err: unknown) => {
        if (err instanceof ExitPromptError) return false;
        throw err;
      },
    );
    if (!confirmed) {
      console.log('Cancelled.');
      return;
    }
  }

  const stop = createStopSignalHandler((signal) => {
    warn(`Received ${signal}: finishing running components, aborting the rest.`);
  });
  const progress = createRunProgress(registry, plan.steps.length);
  const report = await runPlan(plan, registry, {
    force: opts.force,
    failFast: settings.failFast,
    concurrency: settings.concurrency,
    graceMs: settings.graceMs,
    installTimeoutMs: settings.installTimeoutMs,
    probeTimeoutMs: settings.probeTimeoutMs,
    repoRoot: resolveRepoRoot(registry.baseDir),
    signal: stop.signal,
    onEvent: progress.onEvent,
  }).finally(() => {
    progress.stop();
    stop.cleanup();
  });

  console.log('');
  console.log(renderReport(report, registry));

  if (opts.log !== false) {
    try {
      info(`Log written to ${writeRunLog(report, registry, settings.logDir)}`);
    } catch (err) {
      warn(`Could not write install log: ${formatError(err)}`);
    }
  }

  if (report.status !== 'succeeded') {
    process.exit(1);
  }
  ok('All components installed or already satisfied.');
}

export function registerInstall(program: Command): void {
  addRunOptions(
    program
      .command('install')
      .description('Install components and their dependencies')
      .argument('[components...]', 'Component ids or names; opens the selector when omitted')
      .option('--all', 'Select every component'),
  ).action(async (components: string[], opts: InstallFlags) => {
    try {
      const request: SelectionRequest = opts.all
        ? { kind: 'all' }
        : components.length > 0
          ? { kind: 'named', inputs: components }
          : { kind: 'interactive' };
      await installFlow(request, opts);
    } catch (err) {
      die(err);
    }
  });
}
