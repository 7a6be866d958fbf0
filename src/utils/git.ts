import { execFileSync } from 'node:child_process';

/** The git top-level containing `dir`, or `dir` itself outside a work tree. */
export function resolveRepoRoot(dir: string): string {
  try {
    const top = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd: dir,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return top || dir;
  } catch {
    return dir;
  }
}
