import chalk from 'chalk';
import { envVar } from '../config/branding.js';
import { formatError } from '../core/errors.js';

let verbose = Boolean(process.env[envVar('DEBUG')]);

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);

export function debug(msg: string): void {
  if (verbose) console.error(chalk.gray('·'), chalk.gray(msg));
}

export function die(err: unknown): never {
  fail(formatError(err));
  process.exit(1);
}
