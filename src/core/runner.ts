import { spawn } from 'node:child_process';
import type { Action } from '../types/registry.js';

const OUTPUT_LIMIT = 256 * 1024;
const KILL_DELAY_MS = 2000;

export interface ActionRequest {
  action: Action;
  cwd: string;
  env: Record<string, string>;
  /** 0 or undefined disables the timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Time a running action gets to exit on its own after `signal` aborts. */
  graceMs: number;
}

export interface ActionOutcome {
  exitCode: number | null;
  /** Combined stdout and stderr, keeping the tail when over the limit. */
  output: string;
  /** Set when the process could not start or was killed. */
  error?: string;
  timedOut: boolean;
  terminated: boolean;
  durationMs: number;
}

/** Never rejects: spawn failures are reported through `error`. */
export type ActionRunner = (request: ActionRequest) => Promise<ActionOutcome>;

export function describeAction(action: Action): string {
  return action.kind === 'shell'
    ? action.script
    : [action.command, ...action.args].join(' ');
}

/** Appends `chunk`, keeping at most `limit` code units and never half a surrogate pair. */
export function appendTail(buffer: string, chunk: string, limit = OUTPUT_LIMIT): string {
  const next = buffer + chunk;
  if (next.length <= limit) return next;
  let start = next.length - limit;
  const code = next.charCodeAt(start);
  if (code >= 0xdc00 && code <= 0xdfff) start += 1;
  return next.slice(start);
}

export const spawnAction: ActionRunner = (request) => {
  const started = Date.now();
  const { action } = request;
  const command = action.kind === 'shell' ? 'sh' : action.command;
  const args = action.kind === 'shell' ? ['-c', action.script] : action.args;

  return new Promise((resolve) => {
    let output = '';
    let timedOut = false;
    let terminated = false;
    let settled = false;
    const timers: NodeJS.Timeout[] = [];

    const child = spawn(command, args, {
      cwd: request.cwd,
      env: request.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      // own process group, so signals reach everything the action started
      detached: true,
    });

    const signalGroup = (sig: NodeJS.Signals): void => {
      if (child.pid === undefined) return;
      try {
        process.kill(-child.pid, sig);
      } catch {
        // group already gone; the direct child may still be reapable
        child.kill(sig);
      }
    };

    // `settled` rather than the child's exit: descendants can outlive it and hold the pipes
    const kill = (): boolean => {
      if (settled || child.pid === undefined) return false;
      signalGroup('SIGTERM');
      timers.push(
        setTimeout(() => {
          if (!settled) signalGroup('SIGKILL');
        }, KILL_DELAY_MS),
      );
      return true;
    };

    const onAbort = (): void => {
      timers.push(
        setTimeout(() => {
          terminated = kill();
        }, request.graceMs),
      );
    };

    const finish = (outcome: Omit<ActionOutcome, 'durationMs' | 'output' | 'timedOut' | 'terminated'>): void => {
      if (settled) return;
      settled = true;
      for (const timer of timers) clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
      resolve({ ...outcome, output, timedOut, terminated, durationMs: Date.now() - started });
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      output = appendTail(output, chunk);
    });
    child.stderr.on('data', (chunk: string) => {
      output = appendTail(output, chunk);
    });

    if (request.timeoutMs) {
      timers.push(
        setTimeout(() => {
          timedOut = kill();
        }, request.timeoutMs),
      );
    }

    if (request.signal?.aborted) {
      onAbort();
    } else {
      request.signal?.addEventListener('abort', onAbort, { once: true });
    }

    child.on('error', (err) => {
      finish({ exitCode: null, error: err.message });
    });
    child.on('close', (code, signal) => {
      if (timedOut) {
        finish({ exitCode: code, error: `timed out after ${request.timeoutMs}ms` });
      } else if (terminated) {
        finish({ exitCode: code, error: 'terminated after cancellation' });
      } else if (signal) {
        finish({ exitCode: code, error: `killed by ${signal}` });
      } else {
        finish({ exitCode: code });
      }
    });
  });
};
