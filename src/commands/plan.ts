import type { Command } from 'commander';
import { addCommonOptions, loadContext, type CommonOptions } from './context.js';
import { resolveSelection } from '../core/registry.js';
import { buildPlan, formatPlan } from '../core/planner.js';
import { die } from '../ui/output.js';

interface PlanFlags extends CommonOptions {
  json?: boolean;
}

export function registerPlan(program: Command): void {
  addCommonOptions(
    program
      .command('plan')
      .description('Show the execution layers for a selection')
      .argument('<components...>', 'Component ids or names')
      .option('--json', 'Output as JSON'),
  ).action((components: string[], opts: PlanFlags) => {
    try {
      const { registry, graph } = loadContext(opts);
      const plan = buildPlan(graph, resolveSelection(registry, components));

      if (opts.json) {
        console.log(JSON.stringify(plan, null, 2));
        return;
      }
      console.log(formatPlan(plan, registry));
    } catch (err) {
      die(err);
    }
  });
}
