import { InstallHint } from '@probekit/shared';
import type { Probe, ProbeCatalog } from './types.js';

export class ProbeValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProbeValidationError';
  }
}

const PROBE_NAME = /^[a-z0-9_][a-z0-9_.+-]*$/;

/**
 * Checks a probe and, recursively, the probes it depends on.
 * Throws ProbeValidationError on the first problem found.
 */
export function validateProbe(probe: Probe): void {
  if (!PROBE_NAME.test(probe.name)) {
    throw new ProbeValidationError(`Invalid probe name: "${probe.name}"`);
  }

  if (probe.hint && !InstallHint.safeParse(probe.hint).success) {
    throw new ProbeValidationError(`Probe "${probe.name}": invalid install hint`);
  }

  switch (probe.kind) {
    case 'executable':
      if (!probe.command) {
        throw new ProbeValidationError(`Probe "${probe.name}": empty command`);
      }
      break;
    case 'static-file':
      if (!probe.filename || !probe.resolver) {
        throw new ProbeValidationError(`Probe "${probe.name}": filename and resolver are required`);
      }
      for (const dep of probe.dependsOn) validateProbe(dep);
      break;
    case 'composite':
      if (probe.members.length === 0) {
        throw new ProbeValidationError(`Probe "${probe.name}": composite without members`);
      }
      for (const member of probe.members) validateProbe(member);
      break;
  }
}

/**
 * Validates all catalogues and builds a frozen registry keyed by probe name.
 * Throws on duplicate catalogue names or on a probe name used twice.
 */
export function createProbeRegistry(catalogs: ProbeCatalog[]): ReadonlyMap<string, Probe> {
  const catalogNames = new Set<string>();
  const registry = new Map<string, Probe>();

  for (const catalog of catalogs) {
    if (catalogNames.has(catalog.name)) {
      throw new ProbeValidationError(`Duplicate catalog name: "${catalog.name}"`);
    }
    catalogNames.add(catalog.name);

    for (const probe of catalog.probes) {
      validateProbe(probe);
      if (registry.has(probe.name)) {
        throw new ProbeValidationError(
          `Catalog "${catalog.name}": duplicate probe name "${probe.name}"`,
        );
      }
      registry.set(probe.name, probe);
    }
  }

  return registry;
}
