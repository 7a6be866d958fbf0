export { registerInstall, installFlow, addRunOptions } from './install.js';
export type { RunFlags, SelectionRequest } from './install.js';
export { registerPlan } from './plan.js';
export { registerList } from './list.js';
export { registerStatus } from './status.js';
export { registerDoctor } from './doctor.js';
export { registerConfig } from './config.js';
export { registerVersion } from './version.js';
