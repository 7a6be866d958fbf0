import type { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { APP_NAME } from '../config/branding.js';

/** Reads the version from package.json, two levels above both src/commands and dist/commands. */
export function packageVersion(): string {
  try {
    const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8');
    const data: unknown = JSON.parse(raw);
    if (data && typeof data === 'object' && 'version' in data && typeof data.version === 'string') {
      return data.version;
    }
  } catch {
    // running from an unusual layout
  }
  return 'dev';
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const version = packageVersion();

      if (opts.short) {
        console.log(version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify({ version, node: process.version }, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${version} (node ${process.version})`);
    });
}
