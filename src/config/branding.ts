export const APP_NAME = 'patchlink';
export const DISPLAY_NAME = 'Patchlink';
export const DESCRIPTION = 'Patch-version aliases for independently installed Python toolchains';
export const HOME_DIR = '.patchlink';
export const ENV_PREFIX = 'PATCHLINK';
export const DEFAULT_PREFIX = 'uv-';
export const OVERRIDES_FILE = 'alias-overrides.tsv';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
