import { latexCatalog } from './latex/index.js';
import type { Probe } from './types.js';
import { createProbeRegistry } from './validation.js';

export type {
  CheckOutcome,
  CompositeProbe,
  ExecutableProbe,
  FunctionalCheck,
  LocatableProbe,
  Probe,
  ProbeCatalog,
  ProbeEnvironment,
  ProbeKind,
  RunOptions,
  StaticFileProbe,
} from './types.js';
export type { ExecutableOptions, StaticFileOptions } from './probe.js';
export { composite, describeProbe, executable, staticFile } from './probe.js';
export { ProbeValidationError, createProbeRegistry, validateProbe } from './validation.js';
export {
  LATEX_HINT,
  TEX_RESOLVER,
  kpsewhich,
  latex,
  latexCatalog,
  latexPackage,
  latexPackageName,
  lualatex,
  pdflatex,
  texFile,
  xelatex,
} from './latex/index.js';
export { SAMPLE_DOCUMENT, compileSampleDocument } from './latex/sample-document.js';

/** All built-in catalogues, in registry order */
export const catalogs = [latexCatalog];

/** Registry of every built-in probe, keyed by probe name */
export const probeRegistry: ReadonlyMap<string, Probe> = createProbeRegistry(catalogs);

/** Every probe a caller may want to pre-warm or report on */
export function allKnownProbes(): Probe[] {
  return [...probeRegistry.values()];
}
