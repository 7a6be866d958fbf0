// ── Error taxonomy ──────────────────────────────────────────────────
//
// Configuration errors are fatal and raised before anything runs.
// Execution failures are never thrown: they are recorded as results.

export const ERROR_CODES = {
  malformedRegistry: 'MALFORMED_REGISTRY',
  duplicateId: 'DUPLICATE_ID',
  unknownDependency: 'UNKNOWN_DEPENDENCY',
  selfDependency: 'SELF_DEPENDENCY',
  cyclicDependency: 'CYCLIC_DEPENDENCY',
  unknownComponent: 'UNKNOWN_COMPONENT',
  invalidSetting: 'INVALID_SETTING',
  planning: 'PLANNING_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class InstallerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InstallerError';
  }
}

export class MalformedRegistryError extends InstallerError {
  constructor(
    public readonly source: string,
    public readonly issues: string[],
    cause?: unknown,
  ) {
    super(
      ERROR_CODES.malformedRegistry,
      `Malformed registry ${source}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      cause,
    );
    this.name = 'MalformedRegistryError';
  }
}

export class DuplicateIdError extends InstallerError {
  constructor(public readonly id: string) {
    super(ERROR_CODES.duplicateId, `Duplicate component id: ${id}`);
    this.name = 'DuplicateIdError';
  }
}

export class UnknownDependencyError extends InstallerError {
  constructor(
    public readonly id: string,
    public readonly dependency: string,
  ) {
    super(
      ERROR_CODES.unknownDependency,
      `Component ${id} depends on unknown component: ${dependency}`,
    );
    this.name = 'UnknownDependencyError';
  }
}

export class SelfDependencyError extends InstallerError {
  constructor(public readonly id: string) {
    super(ERROR_CODES.selfDependency, `Component ${id} depends on itself`);
    this.name = 'SelfDependencyError';
  }
}

export class CyclicDependencyError extends InstallerError {
  constructor(public readonly cycles: string[][]) {
    super(
      ERROR_CODES.cyclicDependency,
      `Dependency cycle detected:\n${cycles.map((c) => `  ${c.join(' → ')}`).join('\n')}`,
    );
    this.name = 'CyclicDependencyError';
  }
}

export class UnknownComponentError extends InstallerError {
  constructor(public readonly inputs: string[]) {
    super(ERROR_CODES.unknownComponent, `Unknown component(s): ${inputs.join(', ')}`);
    this.name = 'UnknownComponentError';
  }
}

export class InvalidSettingError extends InstallerError {
  constructor(
    public readonly key: string,
    detail: string,
  ) {
    super(ERROR_CODES.invalidSetting, `Invalid setting ${key}: ${detail}`);
    this.name = 'InvalidSettingError';
  }
}

/** Unreachable once the graph has passed cycle detection. */
export class PlanningError extends InstallerError {
  constructor(public readonly remaining: string[]) {
    super(
      ERROR_CODES.planning,
      `Unable to order components: ${remaining.join(', ')}`,
    );
    this.name = 'PlanningError';
  }
}

export function formatError(err: unknown): string {
  if (err instanceof InstallerError) {
    return `[${err.code}] ${err.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
