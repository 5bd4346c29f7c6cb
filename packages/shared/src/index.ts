// Types
export {
  CheckLevel,
  DEFAULT_EXEC_TIMEOUT_MS,
  CONFIG_DIR_NAME,
} from './types/common.js';

// Schemas — Probes
export {
  InstallHint,
  ProbeResult,
  absentResult,
  formatResolution,
  presentResult,
  sameVerdict,
} from './schemas/probes.js';

// Schemas — Config
export { ProbekitConfig } from './schemas/config.js';

// Errors
export { ProbeNotPresentError } from './errors/not-present.js';
