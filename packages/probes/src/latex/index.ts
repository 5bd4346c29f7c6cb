import type { InstallHint } from '@probekit/shared';
import { executable, staticFile } from '../probe.js';
import type { ExecutableProbe, ProbeCatalog, StaticFileProbe } from '../types.js';
import { ProbeValidationError } from '../validation.js';
import { compileSampleDocument } from './sample-document.js';

export const LATEX_HINT: InstallHint = {
  package: 'texlive',
  url: 'https://www.latex-project.org/',
};

/** Resolves TeX file names through the kpathsea search path */
export const TEX_RESOLVER = 'kpsewhich';

const executables = new Map<string, ExecutableProbe>();
const texFiles = new Map<string, StaticFileProbe>();

function memoized<T>(cache: Map<string, T>, key: string, build: () => T): T {
  const existing = cache.get(key);
  if (existing) return existing;
  const created = build();
  cache.set(key, created);
  return created;
}

function texProgram(command: string): ExecutableProbe {
  return memoized(executables, command, () =>
    executable(command, { hint: LATEX_HINT, functionalCheck: compileSampleDocument }),
  );
}

export const latex = (): ExecutableProbe => texProgram('latex');
export const pdflatex = (): ExecutableProbe => texProgram('pdflatex');
export const xelatex = (): ExecutableProbe => texProgram('xelatex');
export const lualatex = (): ExecutableProbe => texProgram('lualatex');

export function kpsewhich(): ExecutableProbe {
  return memoized(executables, TEX_RESOLVER, () => executable(TEX_RESOLVER, { hint: LATEX_HINT }));
}

/**
 * A TeX input file, found by kpsewhich once pdflatex and kpsewhich are present.
 * Reusing a name for a different file throws ProbeValidationError.
 */
export function texFile(name: string, filename: string): StaticFileProbe {
  const probe = memoized(texFiles, name, () =>
    staticFile(name, filename, {
      resolver: TEX_RESOLVER,
      dependsOn: [pdflatex(), kpsewhich()],
      hint: LATEX_HINT,
    }),
  );
  if (probe.filename !== filename) {
    throw new ProbeValidationError(
      `Probe "${name}" already looks for '${probe.filename}', not '${filename}'`,
    );
  }
  return probe;
}

/** "tkz-graph" -> "latex_package_tkz_graph" */
export function latexPackageName(packageName: string): string {
  return `latex_package_${packageName}`.replaceAll('-', '_');
}

/** A LaTeX package, i.e. its `.sty` file */
export function latexPackage(packageName: string): StaticFileProbe {
  return texFile(latexPackageName(packageName), `${packageName}.sty`);
}

export const latexCatalog: ProbeCatalog = {
  name: 'latex',
  description: 'LaTeX typesetting programs and packages',
  probes: [latex(), pdflatex(), xelatex(), lualatex(), latexPackage('tkz-graph')],
};
