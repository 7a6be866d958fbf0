import type { Command } from 'commander';
import { execFileSync } from 'node:child_process';
import { isAbsolute } from 'node:path';
import {
  addCommonOptions,
  loadContext,
  type CommandContext,
  type CommonOptions,
} from './context.js';
import { formatError } from '../core/errors.js';
import { getConfigPath, getHomeRoot } from '../core/userdata.js';
import type { Action } from '../types/registry.js';
import { fileExists, isExecutable } from '../utils/fs.js';
import { ok, fail, warn, info } from '../ui/output.js';
import { DISPLAY_NAME } from '../config/branding.js';

function onPath(name: string): boolean {
  try {
    execFileSync('which', [name], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/** Problems with an exec action's command; shell actions are not inspected. */
export function actionProblems(action: Action): string[] {
  if (action.kind === 'shell') return [];
  if (isAbsolute(action.command)) {
    if (!fileExists(action.command)) return [`${action.command} does not exist`];
    if (!isExecutable(action.command)) return [`${action.command} is not executable`];
    return [];
  }
  return onPath(action.command) ? [] : [`${action.command} not found on PATH`];
}

export function registerDoctor(program: Command): void {
  addCommonOptions(
    program
      .command('doctor')
      .description('Validate the registry and the actions it references'),
  ).action((opts: CommonOptions) => {
    console.log(`\n${DISPLAY_NAME} Doctor\n`);
    console.log(`  Home:   ${getHomeRoot()}`);
    console.log(`  Config: ${getConfigPath()}`);
    console.log('');

    let ctx: CommandContext;
    try {
      ctx = loadContext(opts);
    } catch (err) {
      fail(formatError(err));
      process.exit(1);
    }
    const { registry, settings } = ctx;
    ok(`Registry ${registry.source} — ${registry.components.length} component(s), no cycles`);
    info(`Concurrency ${settings.concurrency}, fail-fast ${settings.failFast ? 'on' : 'off'}`);
    console.log('');

    let problems = 0;
    console.log('Actions:');
    for (const component of registry.components) {
      const issues = [
        ...actionProblems(component.install).map((p) => `install: ${p}`),
        ...(component.check ? actionProblems(component.check).map((p) => `check: ${p}`) : []),
      ];
      if (!component.check) {
        warn(`  ${component.id} — no check command, will reinstall on every run`);
      }
      if (issues.length === 0) {
        ok(`  ${component.id}`);
      } else {
        problems += issues.length;
        for (const issue of issues) fail(`  ${component.id} — ${issue}`);
      }
    }
    console.log('');

    if (problems > 0) {
      fail(`Doctor found ${problems} problem(s).`);
      process.exit(1);
    }
    ok('Doctor complete.');
  });
}
