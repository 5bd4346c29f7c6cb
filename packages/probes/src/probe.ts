import type { InstallHint } from '@probekit/shared';
import type {
  CompositeProbe,
  ExecutableProbe,
  FunctionalCheck,
  Probe,
  StaticFileProbe,
} from './types.js';

export interface ExecutableOptions {
  /** Program to look up; defaults to the probe name */
  command?: string;
  hint?: InstallHint;
  functionalCheck?: FunctionalCheck;
}

export function executable(name: string, options: ExecutableOptions = {}): ExecutableProbe {
  return Object.freeze({
    kind: 'executable',
    name,
    command: options.command ?? name,
    hint: options.hint,
    functionalCheck: options.functionalCheck,
  });
}

export interface StaticFileOptions {
  resolver: string;
  dependsOn?: Probe[];
  hint?: InstallHint;
}

export function staticFile(
  name: string,
  filename: string,
  options: StaticFileOptions,
): StaticFileProbe {
  return Object.freeze({
    kind: 'static-file',
    name,
    filename,
    resolver: options.resolver,
    dependsOn: Object.freeze([...(options.dependsOn ?? [])]),
    hint: options.hint,
  });
}

export function composite(
  name: string,
  members: Probe[],
  options: { hint?: InstallHint } = {},
): CompositeProbe {
  return Object.freeze({
    kind: 'composite',
    name,
    members: Object.freeze([...members]),
    hint: options.hint,
  });
}

/** One-line description of what a probe looks for */
export function describeProbe(probe: Probe): string {
  switch (probe.kind) {
    case 'executable':
      return `executable '${probe.command}'${probe.functionalCheck ? ' (functional check)' : ''}`;
    case 'static-file':
      return `file '${probe.filename}' via ${probe.resolver}`;
    case 'composite':
      return `all of ${probe.members.map((m) => m.name).join(', ')}`;
  }
}
