import { homedir } from 'node:os';
import { join } from 'node:path';
import { HOME_DIR, envVar } from '../config/branding.js';

// ── Directory constants ─────────────────────────────────────────────

const LOGS_DIR = 'logs';
const CONFIG_FILE = 'config.yaml';

// ── Path resolution ─────────────────────────────────────────────────

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return join(getHomeRoot(), CONFIG_FILE);
}

export function getLogsDir(): string {
  return join(getHomeRoot(), LOGS_DIR);
}
