import type { ProbeResult } from '../schemas/probes.js';

/**
 * Raised when a caller asked for something a missing capability
 * would have provided, e.g. the absolute path of an unresolvable file.
 */
export class ProbeNotPresentError extends Error {
  readonly result: ProbeResult;

  constructor(result: ProbeResult) {
    const lines = [`${result.name} is not available.`];
    if (result.reason) lines.push(result.reason);
    if (result.resolution) lines.push(result.resolution);
    super(lines.join('\n'));
    this.name = 'ProbeNotPresentError';
    this.result = result;
  }
}
