import type { ExecutionPlan, PlanStep } from '../types/plan.js';
import type { ComponentId, Registry } from '../types/registry.js';
import type { DependencyGraph } from './graph.js';
import { PlanningError } from './errors.js';

/**
 * Layered topological sort (Kahn) restricted to the selection closure.
 * A layer holds every remaining node whose dependencies are all placed in
 * earlier layers; ties keep registry declaration order.
 */
export function buildPlan(graph: DependencyGraph, selection: ComponentId[]): ExecutionPlan {
  const closure = graph.closure(selection);
  const explicit = new Set(selection);
  const placed = new Set<ComponentId>();
  const layers: ComponentId[][] = [];
  let remaining = closure;

  while (remaining.length > 0) {
    const layer = remaining.filter((id) =>
      graph.dependenciesOf(id).every((dep) => placed.has(dep)),
    );
    if (layer.length === 0) {
      throw new PlanningError(remaining);
    }
    for (const id of layer) placed.add(id);
    layers.push(layer);
    remaining = remaining.filter((id) => !placed.has(id));
  }

  const steps: PlanStep[] = layers.flatMap((layer, index) =>
    layer.map((id) => ({
      id,
      layer: index,
      explicit: explicit.has(id),
      dependsOn: [...graph.dependenciesOf(id)],
    })),
  );

  return { selection: graph.sorted(explicit), layers, steps };
}

export function formatPlan(plan: ExecutionPlan, registry: Registry): string {
  const lines: string[] = [];
  plan.layers.forEach((layer, index) => {
    lines.push(`Layer ${index + 1}:`);
    for (const id of layer) {
      const name = registry.byId.get(id)?.name ?? id;
      const step = plan.steps.find((s) => s.id === id);
      const note = step && !step.explicit ? ' (dependency)' : '';
      lines.push(`  ${name} [${id}]${note}`);
    }
  });
  return lines.join('\n');
}
