export { registerVersion } from './version.js';
export { registerRefresh } from './refresh.js';
export { registerSync } from './sync.js';
export { registerAlias } from './alias.js';
export { registerList } from './list.js';
export { registerClear } from './clear.js';
export { registerUnregister } from './unregister.js';
export { registerConfig } from './config.js';
export { registerDoctor } from './doctor.js';
