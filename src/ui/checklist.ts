import type { DependencyGraph } from '../core/graph.js';
import type { ComponentId } from '../types/registry.js';

/**
 * Virtual-list state for the component checklist. Only `offset` and
 * `cursor` describe the viewport, so the list renders at any height.
 */
export interface ChecklistState {
  cursor: number;
  offset: number;
  explicit: ReadonlySet<ComponentId>;
}

export type Mark = 'explicit' | 'auto' | 'none';

export interface ChecklistRow {
  index: number;
  id: ComponentId;
  mark: Mark;
  active: boolean;
  /** Selected ids that pull an auto-included row in. */
  requiredBy: ComponentId[];
}

export function createChecklist(
  preselected: Iterable<ComponentId>,
  ids: readonly ComponentId[],
): ChecklistState {
  const known = new Set(ids);
  return {
    cursor: 0,
    offset: 0,
    explicit: new Set([...preselected].filter((id) => known.has(id))),
  };
}

/** Keeps `cursor` within `[offset, offset + pageSize)`. */
export function scrollTo(state: ChecklistState, cursor: number, total: number, pageSize: number): ChecklistState {
  if (total === 0) return { ...state, cursor: 0, offset: 0 };
  const size = Math.max(1, pageSize);
  const clamped = Math.min(Math.max(cursor, 0), total - 1);
  let offset = state.offset;
  if (clamped < offset) offset = clamped;
  if (clamped >= offset + size) offset = clamped - size + 1;
  offset = Math.min(Math.max(offset, 0), Math.max(0, total - size));
  return { ...state, cursor: clamped, offset };
}

export function moveCursor(
  state: ChecklistState,
  delta: number,
  total: number,
  pageSize: number,
): ChecklistState {
  return scrollTo(state, state.cursor + delta, total, pageSize);
}

export function visibleRange(
  state: ChecklistState,
  total: number,
  pageSize: number,
): { start: number; end: number } {
  const start = state.offset;
  return { start, end: Math.min(total, start + Math.max(1, pageSize)) };
}

export function liveClosure(graph: DependencyGraph, state: ChecklistState): Set<ComponentId> {
  return new Set(graph.closure(state.explicit));
}

/**
 * Space on an explicit item clears it and on a plain item selects it.
 * An item that only appears because something selected needs it cannot be
 * deselected, so toggling it changes nothing.
 */
export function toggle(state: ChecklistState, id: ComponentId, graph: DependencyGraph): ChecklistState {
  const explicit = new Set(state.explicit);
  if (explicit.has(id)) {
    explicit.delete(id);
  } else if (liveClosure(graph, state).has(id)) {
    return state;
  } else {
    explicit.add(id);
  }
  return { ...state, explicit };
}

/** `a` or `A` (readline may report the latter as `a` with shift); not ctrl+a. */
export function isToggleAllKey(key: { name: string; ctrl?: boolean }): boolean {
  return key.name.toLowerCase() === 'a' && !key.ctrl;
}

/** Selects everything, or clears the selection when everything is already selected. */
export function toggleAll(state: ChecklistState, ids: readonly ComponentId[]): ChecklistState {
  const allSelected = ids.every((id) => state.explicit.has(id));
  return { ...state, explicit: new Set(allSelected ? [] : ids) };
}

export function visibleRows(
  state: ChecklistState,
  ids: readonly ComponentId[],
  graph: DependencyGraph,
  pageSize: number,
): ChecklistRow[] {
  const closure = liveClosure(graph, state);
  const { start, end } = visibleRange(state, ids.length, pageSize);
  const rows: ChecklistRow[] = [];
  for (let index = start; index < end; index++) {
    const id = ids[index];
    const mark: Mark = state.explicit.has(id) ? 'explicit' : closure.has(id) ? 'auto' : 'none';
    rows.push({
      index,
      id,
      mark,
      active: index === state.cursor,
      requiredBy: mark === 'auto' ? graph.requiredBy(id, state.explicit) : [],
    });
  }
  return rows;
}

/** The explicit selection in registry order. */
export function selectionOf(state: ChecklistState, ids: readonly ComponentId[]): ComponentId[] {
  return ids.filter((id) => state.explicit.has(id));
}
