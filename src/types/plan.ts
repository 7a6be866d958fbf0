import type { ComponentId } from './registry.js';

export interface PlanStep {
  id: ComponentId;
  /** Zero-based index into `ExecutionPlan.layers`. */
  layer: number;
  /** Chosen by the operator rather than pulled in as a dependency. */
  explicit: boolean;
  dependsOn: ComponentId[];
}

export interface ExecutionPlan {
  selection: ComponentId[];
  layers: ComponentId[][];
  /** In layer order. */
  steps: PlanStep[];
}

// ── Results ─────────────────────────────────────────────────────────

export const TERMINAL_STATUSES = ['skipped', 'succeeded', 'failed', 'aborted'] as const;

export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];
export type ComponentStatus = 'pending' | 'running' | TerminalStatus;

export type ProbeOutcome = 'none' | 'satisfied' | 'unsatisfied' | 'bypassed' | 'error';

export interface ExecutionResult {
  id: ComponentId;
  status: ComponentStatus;
  probe: ProbeOutcome;
  exitCode: number | null;
  /** Combined stdout/stderr of the probe (when it errored) or install action. */
  output: string;
  reason?: string;
  durationMs: number;
}

export interface RunReport {
  status: 'succeeded' | 'failed';
  cancelled: boolean;
  /** Registry declaration order. */
  results: ExecutionResult[];
  counts: Record<TerminalStatus, number>;
  startedAt: string;
  finishedAt: string;
}
