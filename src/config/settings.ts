import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { SETTING_KEYS, SettingsSchema, type SettingKey } from './schema.js';
import { envVar } from './branding.js';
import { InvalidSettingError } from '../core/errors.js';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_GRACE_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
} from '../core/orchestrator.js';
import { getLogsDir } from '../core/userdata.js';

export type Settings = z.infer<typeof SettingsSchema>;

const BOOLEAN_KEYS = new Set<SettingKey>(['fail_fast']);
const NUMBER_KEYS = new Set<SettingKey>([
  'concurrency',
  'grace_period',
  'install_timeout',
  'probe_timeout',
]);

let configPath = '';
let configData: Settings = {};

function validate(data: unknown): Settings {
  const parsed = SettingsSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new InvalidSettingError(key, issue.message);
  }
  return parsed.data;
}

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

export function init(path: string): void {
  configPath = path;
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    configData = {};
    return;
  }
  configData = validate(yaml.load(raw));
}

export function parseSettingValue(key: SettingKey, raw: string): string | number | boolean {
  const value = raw.trim();
  if (BOOLEAN_KEYS.has(key)) {
    if (['true', '1', 'yes', 'on'].includes(value.toLowerCase())) return true;
    if (['false', '0', 'no', 'off'].includes(value.toLowerCase())) return false;
    throw new InvalidSettingError(key, `expected a boolean, got "${raw}"`);
  }
  if (NUMBER_KEYS.has(key)) {
    const num = Number(value);
    if (value === '' || Number.isNaN(num)) {
      throw new InvalidSettingError(key, `expected a number, got "${raw}"`);
    }
    return num;
  }
  return value;
}

export function get(key: SettingKey): string {
  const value = configData[key];
  return value != null ? String(value) : '';
}

export function set(key: SettingKey, value: string): void {
  configData = validate({ ...configData, [key]: parseSettingValue(key, value) });
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function unset(key: SettingKey): void {
  const next = { ...configData };
  delete next[key];
  configData = next;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function all(): Settings {
  return { ...configData };
}

// ── Effective run settings ──────────────────────────────────────────

export interface RunSettings {
  registry?: string;
  concurrency: number;
  failFast: boolean;
  graceMs: number;
  installTimeoutMs: number;
  probeTimeoutMs: number;
  logDir: string;
}

/** Flag values as commander hands them over (strings, or booleans for switches). */
export type SettingOverrides = Partial<Record<SettingKey, string | boolean>>;

function fromEnv(env: NodeJS.ProcessEnv): Settings {
  const result: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const raw = env[envVar(key)];
    if (raw !== undefined && raw !== '') result[key] = parseSettingValue(key, raw);
  }
  return validate(result);
}

function fromOverrides(overrides: SettingOverrides): Settings {
  const result: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const raw = overrides[key];
    if (raw === undefined) continue;
    result[key] = typeof raw === 'boolean' ? raw : parseSettingValue(key, raw);
  }
  return validate(result);
}

/** Precedence: flag, then RIGUP_* environment variable, then config file, then default. */
export function resolveRunSettings(
  overrides: SettingOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): RunSettings {
  const merged: Settings = { ...configData, ...fromEnv(env), ...fromOverrides(overrides) };
  return {
    registry: merged.registry,
    concurrency: merged.concurrency ?? DEFAULT_CONCURRENCY,
    failFast: merged.fail_fast ?? false,
    graceMs: merged.grace_period !== undefined ? merged.grace_period * 1000 : DEFAULT_GRACE_MS,
    installTimeoutMs: (merged.install_timeout ?? 0) * 1000,
    probeTimeoutMs:
      merged.probe_timeout !== undefined ? merged.probe_timeout * 1000 : DEFAULT_PROBE_TIMEOUT_MS,
    logDir: merged.log_dir ?? getLogsDir(),
  };
}
