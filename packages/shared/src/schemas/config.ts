import { z } from 'zod';

/** Contents of ~/.probekit/config.json */
export const ProbekitConfig = z.object({
  /** Timeout for every spawned resolver or program, in ms */
  execTimeoutMs: z.number().int().positive().optional(),
  /** Probe names that `probekit check` skips */
  disabledProbes: z.array(z.string()).optional(),
});
export type ProbekitConfig = z.infer<typeof ProbekitConfig>;
