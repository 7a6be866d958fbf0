import type { z } from 'zod';
import type {
  ActionObjectSchema,
  ComponentEntrySchema,
  RegistryFileSchema,
} from '../config/schema.js';

export type ComponentEntry = z.infer<typeof ComponentEntrySchema>;
export type RegistryFile = z.infer<typeof RegistryFileSchema>;

export type ComponentId = string;

/** A shell string runs through `sh -c`; an exec action runs directly. */
export type Action =
  | { kind: 'shell'; script: string }
  | ({ kind: 'exec' } & z.infer<typeof ActionObjectSchema>);

export interface Component {
  readonly id: ComponentId;
  readonly name: string;
  readonly description: string;
  readonly dependsOn: readonly ComponentId[];
  readonly check?: Action;
  readonly install: Action;
  readonly default: boolean;
  /** Seconds; overrides the configured install timeout. */
  readonly timeout?: number;
  readonly env: Readonly<Record<string, string>>;
}

export interface Registry {
  readonly source: string;
  readonly baseDir: string;
  /** Declaration order. */
  readonly components: readonly Component[];
  readonly byId: ReadonlyMap<ComponentId, Component>;
}
