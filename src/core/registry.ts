import { readFileSync, existsSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { RegistryFileSchema } from '../config/schema.js';
import { REGISTRY_FILES } from '../config/branding.js';
import type {
  Action,
  Component,
  ComponentEntry,
  ComponentId,
  Registry,
} from '../types/registry.js';
import {
  DuplicateIdError,
  MalformedRegistryError,
  SelfDependencyError,
  UnknownComponentError,
  UnknownDependencyError,
} from './errors.js';
import { getHomeRoot } from './userdata.js';

// ── Location ────────────────────────────────────────────────────────

/**
 * `explicit` is the already-resolved `registry` setting (flag, RIGUP_REGISTRY
 * or config file). Without one, the working directory is searched, then the
 * home directory.
 */
export function findRegistryPath(explicit?: string, cwd = process.cwd()): string {
  if (explicit) return resolve(cwd, explicit);

  for (const name of REGISTRY_FILES) {
    const path = join(cwd, name);
    if (existsSync(path)) return path;
  }
  return join(getHomeRoot(), REGISTRY_FILES[0]);
}

// ── Parsing ─────────────────────────────────────────────────────────

function describeIssue(issue: ZodIssue, data: unknown): string {
  const [root, index, ...rest] = issue.path;
  if (root !== 'components' || typeof index !== 'number') {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  }

  let label = `components[${index}]`;
  if (data && typeof data === 'object' && 'components' in data && Array.isArray(data.components)) {
    const entry: unknown = data.components[index];
    if (entry && typeof entry === 'object' && 'id' in entry && typeof entry.id === 'string') {
      label += ` (${entry.id})`;
    }
  }
  const field = rest.length > 0 ? `.${rest.join('.')}` : '';
  return `${label}${field}: ${issue.message}`;
}

function toAction(raw: ComponentEntry['install_action'], baseDir: string): Action {
  if (typeof raw === 'string') {
    return { kind: 'shell', script: raw };
  }
  const command =
    raw.command.includes('/') && !isAbsolute(raw.command)
      ? resolve(baseDir, raw.command)
      : raw.command;
  return { kind: 'exec', command, args: raw.args };
}

function toComponent(entry: ComponentEntry, baseDir: string): Component {
  return {
    id: entry.id,
    name: entry.name,
    description: entry.description,
    dependsOn: [...new Set(entry.depends_on)],
    check: entry.check_command ? toAction(entry.check_command, baseDir) : undefined,
    install: toAction(entry.install_action, baseDir),
    default: entry.default,
    timeout: entry.timeout,
    env: entry.env,
  };
}

function checkReferences(components: Component[]): Map<ComponentId, Component> {
  const byId = new Map<ComponentId, Component>();
  for (const component of components) {
    if (byId.has(component.id)) {
      throw new DuplicateIdError(component.id);
    }
    byId.set(component.id, component);
  }

  for (const component of components) {
    for (const dep of component.dependsOn) {
      if (dep === component.id) throw new SelfDependencyError(component.id);
      if (!byId.has(dep)) throw new UnknownDependencyError(component.id, dep);
    }
  }
  return byId;
}

/** Parses YAML or JSON registry text. Relative action paths resolve against `baseDir`. */
export function parseRegistry(raw: string, source: string, baseDir: string): Registry {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new MalformedRegistryError(source, [String(err)], err);
  }

  if (data == null || typeof data !== 'object') {
    throw new MalformedRegistryError(source, ['expected a mapping with a "components" list']);
  }

  const parsed = RegistryFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedRegistryError(
      source,
      parsed.error.issues.map((issue) => describeIssue(issue, data)),
      parsed.error,
    );
  }

  const components = parsed.data.components.map((entry) => toComponent(entry, baseDir));
  const byId = checkReferences(components);
  return { source, baseDir, components, byId };
}

export function loadRegistry(path: string): Registry {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new MalformedRegistryError(path, [`cannot read file (${String(err)})`], err);
  }
  return parseRegistry(raw, path, dirname(path));
}

// ── Selection ───────────────────────────────────────────────────────

/**
 * Maps operator input to component ids. Input matches an id exactly or a
 * display name case-insensitively. Returns ids in registry order.
 */
export function resolveSelection(registry: Registry, inputs: string[]): ComponentId[] {
  const chosen = new Set<ComponentId>();
  const unknown: string[] = [];

  for (const input of inputs) {
    const trimmed = input.trim();
    if (!trimmed) continue;
    if (registry.byId.has(trimmed)) {
      chosen.add(trimmed);
      continue;
    }
    const lower = trimmed.toLowerCase();
    const byName = registry.components.find((c) => c.name.toLowerCase() === lower);
    if (byName) {
      chosen.add(byName.id);
    } else {
      unknown.push(trimmed);
    }
  }

  if (unknown.length > 0) throw new UnknownComponentError(unknown);
  return registry.components.filter((c) => chosen.has(c.id)).map((c) => c.id);
}

export function defaultSelection(registry: Registry): ComponentId[] {
  return registry.components.filter((c) => c.default).map((c) => c.id);
}
