import {
  type Probe,
  type ProbeCatalog,
  catalogs as builtinCatalogs,
  describeProbe,
  probeRegistry,
} from '@probekit/probes';
import { type ProbeResult, ProbeNotPresentError } from '@probekit/shared';
import { loadConfig, saveConfig } from '../config.js';
import { Prober } from '../runtime/prober.js';
import { createSystemEnvironment } from '../system/environment.js';

export interface ProbeCommandDeps {
  catalogs: ProbeCatalog[];
  registry: ReadonlyMap<string, Probe>;
  prober: Prober;
  /** Probe names skipped by `check` */
  disabled: Set<string>;
  log: (msg: string) => void;
  persist: (disabledProbes: string[]) => void;
}

export interface CheckOptions {
  functional?: boolean;
  json?: boolean;
}

export interface CheckSummary {
  results: ProbeResult[];
  skipped: string[];
  unknown: string[];
}

export function createDefaultDeps(options: { verbose?: boolean } = {}): ProbeCommandDeps {
  const config = loadConfig();
  const env = createSystemEnvironment({ timeoutMs: config.execTimeoutMs });
  return {
    catalogs: builtinCatalogs,
    registry: probeRegistry,
    prober: new Prober(env, { log: options.verbose ? console.error : undefined }),
    disabled: new Set(config.disabledProbes ?? []),
    log: console.log,
    persist: (disabled) => {
      const current = loadConfig();
      current.disabledProbes = disabled.length > 0 ? disabled : undefined;
      saveConfig(current);
    },
  };
}

const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;

export function cmdList(deps: ProbeCommandDeps): void {
  const { catalogs, disabled, log } = deps;

  if (catalogs.length === 0) {
    log('No probes registered.');
    return;
  }

  for (const catalog of catalogs) {
    log(`${bold(catalog.name)} (${catalog.probes.length} probes)`);
    log(`  ${catalog.description}`);
    for (const probe of catalog.probes) {
      const suffix = disabled.has(probe.name) ? ' [disabled]' : '';
      log(`  - ${probe.name}: ${describeProbe(probe)}${suffix}`);
    }
    log('');
  }
}

function formatResult(result: ProbeResult): string[] {
  if (result.present) return [`  ✓ ${result.name}`];
  const lines = [`  ✗ ${result.name}: ${result.reason}`];
  if (result.resolution) lines.push(`      ${result.resolution}`);
  return lines;
}

/**
 * Evaluates the named probes, or every registered one when no name is given.
 * Probes are independent, so they are evaluated concurrently.
 */
export async function cmdCheck(
  names: string[],
  options: CheckOptions,
  deps: ProbeCommandDeps,
): Promise<CheckSummary> {
  const { registry, prober, disabled, log } = deps;

  const requested = names.length > 0 ? names : [...registry.keys()];
  const unknown = requested.filter((name) => !registry.has(name));
  const skipped = requested.filter((name) => registry.has(name) && disabled.has(name));
  const selected: Probe[] = [];
  for (const name of requested) {
    const probe = registry.get(name);
    if (probe && !disabled.has(name)) selected.push(probe);
  }

  const results = await Promise.all(
    selected.map((probe) =>
      options.functional ? prober.isFunctional(probe) : prober.isPresent(probe),
    ),
  );

  if (options.json) {
    log(JSON.stringify({ results, skipped, unknown }, null, 2));
    return { results, skipped, unknown };
  }

  for (const name of unknown) {
    log(`Error: Probe "${name}" not found.`);
  }
  if (unknown.length > 0) {
    log(`Available probes: ${[...registry.keys()].join(', ')}`);
    log('');
  }

  log(options.functional ? 'Functional check results:' : 'Presence check results:');
  log('');
  for (const result of results) {
    for (const line of formatResult(result)) log(line);
  }
  for (const name of skipped) {
    log(`  - ${name}: disabled`);
  }

  return { results, skipped, unknown };
}

/** Prints the absolute path a probe resolves to */
export async function cmdPath(name: string, deps: ProbeCommandDeps): Promise<boolean> {
  const { registry, prober, log } = deps;

  const probe = registry.get(name);
  if (!probe) {
    log(`Error: Probe "${name}" not found.`);
    return false;
  }
  if (probe.kind === 'composite') {
    log(`Error: Probe "${name}" does not resolve to a path.`);
    return false;
  }

  try {
    log(await prober.absoluteFilename(probe));
    return true;
  } catch (error) {
    if (error instanceof ProbeNotPresentError) {
      log(error.message);
      return false;
    }
    throw error;
  }
}

function disabledList(deps: ProbeCommandDeps): string[] {
  return [...deps.registry.keys()].filter((k) => deps.disabled.has(k));
}

export function cmdDisable(name: string, deps: ProbeCommandDeps): boolean {
  const { registry, disabled, log, persist } = deps;

  if (!registry.has(name)) {
    log(`Error: Probe "${name}" not found.`);
    return false;
  }
  if (disabled.has(name)) {
    log(`Probe "${name}" is already disabled.`);
    return true;
  }

  disabled.add(name);
  persist(disabledList(deps));
  log(`Probe "${name}" disabled.`);
  return true;
}

export function cmdEnable(name: string, deps: ProbeCommandDeps): boolean {
  const { disabled, log, persist } = deps;

  if (!disabled.has(name)) {
    log(`Error: Probe "${name}" is not disabled.`);
    return false;
  }

  disabled.delete(name);
  persist(disabledList(deps));
  log(`Probe "${name}" enabled.`);
  return true;
}
