export * from './errors.js';
export * from './layout.js';
export * from './host.js';

export { findRuntime, probeVersion, DEFAULT_PROBE_TIMEOUT_MS } from './probe.js';
export { collectRecords, listRegistrations } from './collector.js';

export {
  getOverride,
  setOverride,
  unsetOverride,
  listOverrides,
} from './overrides.js';

export {
  groupByVersion,
  resolveAliases,
  resolveGroup,
  resolveOverrideTarget,
  displayId,
} from './resolver.js';

export {
  aliasPath,
  isManagedPath,
  isOwnedLink,
  isProtected,
  link,
  removeLink,
} from './linker.js';

export { refresh } from './refresh.js';
export { syncRegistrations, clearAliases, unregister } from './registration.js';
