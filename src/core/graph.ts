import type { ComponentId, Registry } from '../types/registry.js';
import { CyclicDependencyError, UnknownComponentError } from './errors.js';

/** A closed path: the first id is repeated at the end. */
export type Cycle = ComponentId[];

/**
 * Depth-first search in declaration order. Every back edge yields one
 * cycle, so each strongly connected group is reported at least once.
 */
export function detectCycles(registry: Registry): Cycle[] {
  const state = new Map<ComponentId, 'visiting' | 'visited'>();
  const path: ComponentId[] = [];
  const cycles: Cycle[] = [];

  const visit = (id: ComponentId): void => {
    state.set(id, 'visiting');
    path.push(id);

    for (const dep of registry.byId.get(id)?.dependsOn ?? []) {
      const depState = state.get(dep);
      if (depState === 'visiting') {
        cycles.push([...path.slice(path.indexOf(dep)), dep]);
      } else if (depState === undefined) {
        visit(dep);
      }
    }

    path.pop();
    state.set(id, 'visited');
  };

  for (const component of registry.components) {
    if (!state.has(component.id)) visit(component.id);
  }
  return cycles;
}

export class DependencyGraph {
  private readonly position = new Map<ComponentId, number>();
  private readonly dependents = new Map<ComponentId, ComponentId[]>();

  private constructor(readonly registry: Registry) {
    registry.components.forEach((component, index) => {
      this.position.set(component.id, index);
      this.dependents.set(component.id, []);
    });
    for (const component of registry.components) {
      for (const dep of component.dependsOn) {
        this.dependents.get(dep)?.push(component.id);
      }
    }
  }

  /** Rejects any registry whose dependency edges form a cycle. */
  static from(registry: Registry): DependencyGraph {
    const cycles = detectCycles(registry);
    if (cycles.length > 0) {
      throw new CyclicDependencyError(cycles);
    }
    return new DependencyGraph(registry);
  }

  has(id: ComponentId): boolean {
    return this.position.has(id);
  }

  /** Declaration index, used as the deterministic tie-breaker. */
  indexOf(id: ComponentId): number {
    const index = this.position.get(id);
    if (index === undefined) throw new UnknownComponentError([id]);
    return index;
  }

  dependenciesOf(id: ComponentId): readonly ComponentId[] {
    const component = this.registry.byId.get(id);
    if (!component) throw new UnknownComponentError([id]);
    return component.dependsOn;
  }

  dependentsOf(id: ComponentId): readonly ComponentId[] {
    const list = this.dependents.get(id);
    if (!list) throw new UnknownComponentError([id]);
    return list;
  }

  /** Selected ids plus everything they transitively depend on, in registry order. */
  closure(selected: Iterable<ComponentId>): ComponentId[] {
    const roots = [...selected];
    const unknown = roots.filter((id) => !this.has(id));
    if (unknown.length > 0) throw new UnknownComponentError(unknown);

    const reached = new Set<ComponentId>();
    const stack = [...roots];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || reached.has(id)) continue;
      reached.add(id);
      stack.push(...this.dependenciesOf(id));
    }
    return this.sorted(reached);
  }

  /** The selected ids (other than `id` itself) whose closure pulls `id` in. */
  requiredBy(id: ComponentId, selected: Iterable<ComponentId>): ComponentId[] {
    const result: ComponentId[] = [];
    for (const root of selected) {
      if (root !== id && this.closure([root]).includes(id)) {
        result.push(root);
      }
    }
    return this.sorted(result);
  }

  sorted(ids: Iterable<ComponentId>): ComponentId[] {
    return [...ids].sort((a, b) => this.indexOf(a) - this.indexOf(b));
  }
}

export function buildGraph(registry: Registry): DependencyGraph {
  return DependencyGraph.from(registry);
}
