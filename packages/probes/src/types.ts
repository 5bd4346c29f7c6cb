import type { InstallHint } from '@probekit/shared';

export interface RunOptions {
  /** Working directory for the spawned program */
  cwd: string;
}

/** Abstraction over the machine being probed, swapped for a double in tests */
export interface ProbeEnvironment {
  /** Absolute path of `command` on the search path, or undefined */
  which(command: string): Promise<string | undefined>;
  /** Runs `<resolver> <filename>`; the resolved path, or undefined on a non-zero exit */
  resolveFile(resolver: string, filename: string): Promise<string | undefined>;
  /** Runs a program to completion and returns its exit status */
  run(command: string, args: string[], options: RunOptions): Promise<number>;
}

export type CheckOutcome = { ok: true } | { ok: false; reason: string };

/** Confirms that a located executable actually works */
export type FunctionalCheck = (
  probe: ExecutableProbe,
  executablePath: string,
  env: ProbeEnvironment,
) => Promise<CheckOutcome>;

/** A program looked up on the search path */
export interface ExecutableProbe {
  readonly kind: 'executable';
  readonly name: string;
  readonly command: string;
  readonly hint?: InstallHint;
  readonly functionalCheck?: FunctionalCheck;
}

/**
 * A file located through an external resolver command.
 * Every entry of `dependsOn` must be present before the resolver runs.
 */
export interface StaticFileProbe {
  readonly kind: 'static-file';
  readonly name: string;
  readonly filename: string;
  readonly resolver: string;
  readonly dependsOn: readonly Probe[];
  readonly hint?: InstallHint;
}

/** Present iff all members are present, checked in declaration order */
export interface CompositeProbe {
  readonly kind: 'composite';
  readonly name: string;
  readonly members: readonly Probe[];
  readonly hint?: InstallHint;
}

export type Probe = ExecutableProbe | StaticFileProbe | CompositeProbe;

export type ProbeKind = Probe['kind'];

/** Probes able to report an absolute path */
export type LocatableProbe = ExecutableProbe | StaticFileProbe;

/** A group of probes one external system depends on */
export interface ProbeCatalog {
  name: string;
  description: string;
  probes: Probe[];
}
