import type { LocatableProbe, Probe, ProbeEnvironment } from '@probekit/probes';
import {
  type CheckLevel,
  type ProbeResult,
  ProbeNotPresentError,
  absentResult,
  presentResult,
} from '@probekit/shared';
import { ProbeCache, type ProbeEvaluation } from './cache.js';

export interface ProberOptions {
  /** Shared cache; a private one is created when omitted */
  cache?: ProbeCache;
  /** Receives one line per probe evaluated for the first time */
  log?: (msg: string) => void;
}

/**
 * Answers presence and functionality queries for probes.
 * Absence is returned as data; only the path and require queries reject.
 */
export class Prober {
  private env: ProbeEnvironment;
  private cache: ProbeCache;
  private log?: (msg: string) => void;

  constructor(env: ProbeEnvironment, options: ProberOptions = {}) {
    this.env = env;
    this.cache = options.cache ?? new ProbeCache();
    this.log = options.log;
  }

  async isPresent(probe: Probe): Promise<ProbeResult> {
    const { result } = await this.evaluate(probe);
    return result;
  }

  /**
   * Runs the functional check of an executable once it is found.
   * Probes without a functional check report their presence.
   */
  async isFunctional(probe: Probe): Promise<ProbeResult> {
    if (probe.kind !== 'executable' || !probe.functionalCheck) {
      return this.isPresent(probe);
    }
    const check = probe.functionalCheck;

    const { result } = await this.cache.getOrCompute(probe, 'functional', () =>
      this.guarded(probe, 'functional', async () => {
        const presence = await this.evaluate(probe);
        if (!presence.result.present || presence.path === undefined) return presence;

        const outcome = await check(probe, presence.path, this.env);
        if (outcome.ok) return presence;
        const reason = outcome.reason || `${probe.name} is not functional`;
        return { result: absentResult(probe.name, reason, probe.hint) };
      }),
    );
    return result;
  }

  /** Absolute path of a located file or executable; rejects with ProbeNotPresentError */
  async absoluteFilename(probe: LocatableProbe): Promise<string> {
    const { result, path } = await this.evaluate(probe);
    if (!result.present) throw new ProbeNotPresentError(result);
    if (path === undefined) throw new Error(`Probe ${probe.name} resolved without a path`);
    return path;
  }

  async requirePresent(probe: Probe): Promise<void> {
    const result = await this.isPresent(probe);
    if (!result.present) throw new ProbeNotPresentError(result);
  }

  private evaluate(probe: Probe): Promise<ProbeEvaluation> {
    return this.cache.getOrCompute(probe, 'present', () =>
      this.guarded(probe, 'present', () => this.checkPresence(probe)),
    );
  }

  private async checkPresence(probe: Probe): Promise<ProbeEvaluation> {
    switch (probe.kind) {
      case 'executable': {
        const path = await this.env.which(probe.command);
        if (path === undefined) {
          const reason = `Executable '${probe.command}' not found on PATH.`;
          return { result: absentResult(probe.name, reason, probe.hint) };
        }
        return { result: presentResult(probe.name), path };
      }

      case 'static-file': {
        const blocker = await this.firstAbsent(probe.dependsOn);
        if (blocker) return this.blockedBy(probe, blocker);

        const path = await this.env.resolveFile(probe.resolver, probe.filename);
        if (path === undefined) {
          const reason = `'${probe.filename}' not found by ${probe.resolver}`;
          return { result: absentResult(probe.name, reason, probe.hint) };
        }
        return { result: presentResult(probe.name), path };
      }

      case 'composite': {
        const blocker = await this.firstAbsent(probe.members);
        if (blocker) return this.blockedBy(probe, blocker);
        return { result: presentResult(probe.name) };
      }
    }
  }

  /** Evaluates in order and stops at the first absent probe */
  private async firstAbsent(probes: readonly Probe[]): Promise<ProbeResult | undefined> {
    for (const probe of probes) {
      const result = await this.isPresent(probe);
      if (!result.present) return result;
    }
    return undefined;
  }

  private blockedBy(probe: Probe, blocker: ProbeResult): ProbeEvaluation {
    const reason = blocker.reason ?? `${blocker.name} is not available`;
    return { result: absentResult(probe.name, reason, probe.hint) };
  }

  private async guarded(
    probe: Probe,
    level: CheckLevel,
    check: () => Promise<ProbeEvaluation>,
  ): Promise<ProbeEvaluation> {
    let evaluation: ProbeEvaluation;
    try {
      evaluation = await check();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const reason = `Checking ${probe.name} failed unexpectedly: ${message}`;
      evaluation = { result: absentResult(probe.name, reason, probe.hint) };
    }

    const { result } = evaluation;
    this.log?.(
      result.present
        ? `probe ${probe.name} (${level}): present`
        : `probe ${probe.name} (${level}): absent (${result.reason})`,
    );
    return evaluation;
  }
}
