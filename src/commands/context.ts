import * as settings from '../config/settings.js';
import type { Settings } from '../config/schema.js';
import type { Layout } from '../types/records.js';
import {
  createPyenvHost,
  getConfigPath,
  getOverridesFile,
  resolveLayout,
  DEFAULT_PROBE_TIMEOUT_MS,
  type Host,
} from '../core/index.js';

export interface CommandContext {
  settings: Settings;
  layout: Layout;
  host: Host;
  overridesFile: string;
  probeTimeoutMs: number;
}

export function loadContext(): CommandContext {
  const loaded = settings.init(getConfigPath());
  const layout = resolveLayout(loaded);
  return {
    settings: loaded,
    layout,
    host: createPyenvHost(loaded),
    overridesFile: getOverridesFile(layout),
    probeTimeoutMs: loaded.probe_timeout_ms ?? DEFAULT_PROBE_TIMEOUT_MS,
  };
}
