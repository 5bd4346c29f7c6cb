import type { Probe } from '@probekit/probes';
import type { CheckLevel, ProbeResult } from '@probekit/shared';

/** A cached verdict plus the absolute path it resolved to, if any */
export interface ProbeEvaluation {
  result: ProbeResult;
  path?: string;
}

/**
 * Process-wide memo of probe verdicts. Entries never expire: a capability
 * is assumed not to appear or vanish while the process runs.
 *
 * In-flight evaluations are stored too, so concurrent first queries for
 * the same probe share one external invocation.
 */
export class ProbeCache {
  private entries = new Map<string, Promise<ProbeEvaluation>>();

  static keyOf(probe: Probe, level: CheckLevel): string {
    return `${level}:${probe.kind}:${probe.name}`;
  }

  getOrCompute(
    probe: Probe,
    level: CheckLevel,
    compute: () => Promise<ProbeEvaluation>,
  ): Promise<ProbeEvaluation> {
    const key = ProbeCache.keyOf(probe, level);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const pending = compute();
    this.entries.set(key, pending);
    // Rejected computations are not cached
    pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }

  has(probe: Probe, level: CheckLevel): boolean {
    return this.entries.has(ProbeCache.keyOf(probe, level));
  }

  get size(): number {
    return this.entries.size;
  }
}
