export const APP_NAME = 'rigup';
export const DISPLAY_NAME = 'Rigup';
export const DESCRIPTION = 'Dependency-aware installer for workstation components';
export const HOME_DIR = '.rigup';
export const ENV_PREFIX = 'RIGUP';
export const REGISTRY_FILES = ['components.yaml', 'components.yml', 'components.json'];

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
