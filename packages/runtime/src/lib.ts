export { Prober } from './runtime/prober.js';
export type { ProberOptions } from './runtime/prober.js';
export { ProbeCache } from './runtime/cache.js';
export type { ProbeEvaluation } from './runtime/cache.js';
export { createSystemEnvironment, findOnPath } from './system/environment.js';
export type { SystemEnvironmentOptions } from './system/environment.js';
export { ConfigError, getConfigDir, getConfigPath, loadConfig, saveConfig } from './config.js';
