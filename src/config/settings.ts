import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { SettingsSchema, SETTINGS_KEYS, type Settings, type SettingsKey } from './schema.js';

let configPath = '';
let configData: Settings = {};

export function init(path: string): Settings {
  configPath = path;
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    configData = {};
    return configData;
  }
  const parsed = SettingsSchema.safeParse(yaml.load(raw) ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid settings in ${path}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  configData = parsed.data;
  return configData;
}

export function isKey(key: string): key is SettingsKey {
  return SETTINGS_KEYS.some((k) => k === key);
}

export function get(key: string): string {
  if (!isKey(key)) return '';
  const value = configData[key];
  if (value == null) return '';
  return Array.isArray(value) ? value.join(' ') : String(value);
}

export function set(key: string, value: string): void {
  if (!isKey(key)) {
    throw new Error(`Unknown setting "${key}". Expected one of: ${SETTINGS_KEYS.join(', ')}.`);
  }
  const next = SettingsSchema.safeParse({ ...configData, [key]: value });
  if (!next.success) {
    throw new Error(`Invalid value for "${key}": ${next.error.issues.map((i) => i.message).join('; ')}`);
  }
  configData = next.data;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData, { skipInvalid: true }), 'utf-8');
}

export function all(): Settings {
  return { ...configData };
}
