import type {
  ComponentStatus,
  ExecutionResult,
  TerminalStatus,
} from '../types/plan.js';
import type { ComponentId } from '../types/registry.js';

const TRANSITIONS: Record<ComponentStatus, readonly ComponentStatus[]> = {
  pending: ['running', 'skipped', 'failed', 'aborted'],
  running: ['succeeded', 'failed'],
  skipped: [],
  succeeded: [],
  failed: [],
  aborted: [],
};

export function isTerminal(status: ComponentStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0;
}

/** Dependents may start only from these states. */
export function isSatisfied(status: ComponentStatus): boolean {
  return status === 'succeeded' || status === 'skipped';
}

type ResultDetails = Partial<Omit<ExecutionResult, 'id' | 'status'>>;

/**
 * Per-component results. Every write goes through `transition`, which
 * rejects anything the state machine does not allow, so each component
 * reaches exactly one terminal state.
 */
export class ResultStore {
  private readonly results = new Map<ComponentId, ExecutionResult>();

  constructor(ids: Iterable<ComponentId>) {
    for (const id of ids) {
      this.results.set(id, {
        id,
        status: 'pending',
        probe: 'none',
        exitCode: null,
        output: '',
        durationMs: 0,
      });
    }
  }

  get(id: ComponentId): ExecutionResult {
    const result = this.results.get(id);
    if (!result) throw new Error(`No result slot for component: ${id}`);
    return result;
  }

  status(id: ComponentId): ComponentStatus {
    return this.get(id).status;
  }

  transition(id: ComponentId, next: ComponentStatus, details: ResultDetails = {}): ExecutionResult {
    const current = this.get(id);
    if (!TRANSITIONS[current.status].includes(next)) {
      throw new Error(`Illegal transition for ${id}: ${current.status} → ${next}`);
    }
    const updated: ExecutionResult = { ...current, ...details, id, status: next };
    this.results.set(id, updated);
    return updated;
  }

  list(order: readonly ComponentId[]): ExecutionResult[] {
    return order.filter((id) => this.results.has(id)).map((id) => ({ ...this.get(id) }));
  }
}
