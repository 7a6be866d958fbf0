import ora from 'ora';
import chalk from 'chalk';
import type { RunEvent } from '../core/orchestrator.js';
import type { Registry } from '../types/registry.js';
import type { TerminalStatus } from '../types/plan.js';
import { isTerminal } from '../core/results.js';

export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
): Promise<T> {
  const spinner = ora(text).start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}

const FINISH_SYMBOLS: Record<TerminalStatus, string> = {
  succeeded: chalk.green('✓'),
  skipped: chalk.cyan('↷'),
  failed: chalk.red('✗'),
  aborted: chalk.yellow('⊘'),
};

export interface RunProgress {
  onEvent: (event: RunEvent) => void;
  stop: () => void;
}

/** A single spinner naming the components currently in flight. */
export function createRunProgress(registry: Registry, total: number): RunProgress {
  const spinner = ora().start();
  const active = new Map<string, string>();
  let finished = 0;
  const nameOf = (id: string): string => registry.byId.get(id)?.name ?? id;

  const refresh = (): void => {
    const names = [...active.entries()].map(([id, phase]) => `${nameOf(id)}${phase === 'probe' ? ' (checking)' : ''}`);
    spinner.text = `[${finished}/${total}] ${names.length > 0 ? names.join(', ') : 'waiting'}`;
  };

  const onEvent = (event: RunEvent): void => {
    if (event.type === 'probe' || event.type === 'start') {
      active.set(event.id, event.type);
    } else {
      const { result } = event;
      active.delete(result.id);
      finished += 1;
      const symbol = isTerminal(result.status) ? FINISH_SYMBOLS[result.status] : ' ';
      const suffix = result.reason ? chalk.dim(` ${result.reason}`) : '';
      spinner.stopAndPersist({ symbol, text: `${nameOf(result.id)} ${result.status}${suffix}` });
      spinner.start();
    }
    refresh();
  };

  refresh();
  return { onEvent, stop: () => spinner.stop() };
}
