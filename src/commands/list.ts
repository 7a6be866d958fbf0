import type { Command } from 'commander';
import { addCommonOptions, loadContext, type CommonOptions } from './context.js';
import type { DependencyGraph } from '../core/graph.js';
import { describeAction } from '../core/runner.js';
import type { Registry } from '../types/registry.js';
import { printTable } from '../ui/table.js';
import { die } from '../ui/output.js';

interface ListFlags extends CommonOptions {
  json?: boolean;
}

export interface ListEntry {
  id: string;
  name: string;
  description: string;
  depends_on: string[];
  /** Components that declare this one as a direct dependency. */
  required_by: string[];
  check_command: string | null;
  install_action: string;
  default: boolean;
}

export function listEntries(registry: Registry, graph: DependencyGraph): ListEntry[] {
  return registry.components.map((c) => ({
    id: c.id,
    name: c.name,
    description: c.description,
    depends_on: [...c.dependsOn],
    required_by: [...graph.dependentsOf(c.id)],
    check_command: c.check ? describeAction(c.check) : null,
    install_action: describeAction(c.install),
    default: c.default,
  }));
}

export function registerList(program: Command): void {
  addCommonOptions(
    program
      .command('list')
      .description('List registry components')
      .option('--json', 'Output as JSON'),
  ).action((opts: ListFlags) => {
    try {
      const { registry, graph } = loadContext(opts);
      const entries = listEntries(registry, graph);

      if (opts.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log('No components in registry.');
        return;
      }

      const rows = entries.map((e) => [
        e.id,
        e.name,
        e.depends_on.join(', ') || '-',
        e.required_by.join(', ') || '-',
        e.check_command ? 'yes' : 'no',
        e.description,
      ]);
      printTable(['Id', 'Name', 'Depends on', 'Required by', 'Check', 'Description'], rows);
    } catch (err) {
      die(err);
    }
  });
}
