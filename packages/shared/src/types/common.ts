import { z } from 'zod';

export const CheckLevel = z.enum(['present', 'functional']);
export type CheckLevel = z.infer<typeof CheckLevel>;

/** Upper bound on any subprocess spawned by a probe, in ms */
export const DEFAULT_EXEC_TIMEOUT_MS = 30_000;

/** Directory under the home directory holding config.json */
export const CONFIG_DIR_NAME = '.probekit';
