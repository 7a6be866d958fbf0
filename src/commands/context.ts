import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import type { RunSettings, SettingOverrides } from '../config/settings.js';
import { buildGraph, type DependencyGraph } from '../core/graph.js';
import { findRegistryPath, loadRegistry } from '../core/registry.js';
import { getConfigPath } from '../core/userdata.js';
import type { Registry } from '../types/registry.js';
import { debug, setVerbose } from '../ui/output.js';

export interface CommonOptions {
  registry?: string;
  verbose?: boolean;
}

export interface CommandContext {
  settings: RunSettings;
  registry: Registry;
  /** Built only after cycle detection passed. */
  graph: DependencyGraph;
}

export function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('-r, --registry <path>', 'Component registry file (YAML or JSON)')
    .option('-v, --verbose', 'Print debug output');
}

/** Every configuration error surfaces here, before anything is selected or run. */
export function loadContext(opts: CommonOptions, overrides: SettingOverrides = {}): CommandContext {
  if (opts.verbose) setVerbose(true);
  settings.init(getConfigPath());
  const effective = settings.resolveRunSettings({ ...overrides, registry: opts.registry });

  const path = findRegistryPath(effective.registry);
  debug(`Registry: ${path}`);
  const registry = loadRegistry(path);
  const graph = buildGraph(registry);
  debug(`Loaded ${registry.components.length} component(s)`);

  return { settings: effective, registry, graph };
}
