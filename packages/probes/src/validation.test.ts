import { describe, expect, it } from 'vitest';
import { composite, executable, staticFile } from './probe.js';
import type { ProbeCatalog } from './types.js';
import { ProbeValidationError, createProbeRegistry, validateProbe } from './validation.js';

function makeCatalog(overrides?: Partial<ProbeCatalog>): ProbeCatalog {
  return {
    name: 'test',
    description: 'Test catalog',
    probes: [executable('foo'), executable('bar')],
    ...overrides,
  };
}

describe('validateProbe', () => {
  it('passes for valid probes', () => {
    const file = staticFile('latex_package_graphics', 'graphics.sty', {
      resolver: 'kpsewhich',
      dependsOn: [executable('kpsewhich')],
    });
    expect(() => validateProbe(composite('all', [file, executable('pdflatex')]))).not.toThrow();
  });

  it('rejects names with spaces or uppercase letters', () => {
    expect(() => validateProbe(executable('Bad Name', { command: 'x' }))).toThrow(
      'Invalid probe name: "Bad Name"',
    );
  });

  it('rejects an empty composite', () => {
    expect(() => validateProbe(composite('empty', []))).toThrow(ProbeValidationError);
    expect(() => validateProbe(composite('empty', []))).toThrow('composite without members');
  });

  it('rejects a static file without a resolver', () => {
    const probe = staticFile('x', 'x.tex', { resolver: '' });
    expect(() => validateProbe(probe)).toThrow('Probe "x": filename and resolver are required');
  });

  it('rejects an invalid install hint', () => {
    const probe = executable('latex', { hint: { url: 'not a url' } });
    expect(() => validateProbe(probe)).toThrow('Probe "latex": invalid install hint');
  });

  it('validates nested members', () => {
    const probe = composite('outer', [executable('Nested!')]);
    expect(() => validateProbe(probe)).toThrow('Invalid probe name: "Nested!"');
  });
});

describe('createProbeRegistry', () => {
  it('returns a map keyed by probe name in declaration order', () => {
    const registry = createProbeRegistry([makeCatalog()]);

    expect([...registry.keys()]).toEqual(['foo', 'bar']);
  });

  it('throws on duplicate catalog names', () => {
    expect(() =>
      createProbeRegistry([makeCatalog(), makeCatalog({ probes: [executable('baz')] })]),
    ).toThrow('Duplicate catalog name: "test"');
  });

  it('throws on a probe name used by two catalogs', () => {
    const other = makeCatalog({ name: 'other', probes: [executable('foo')] });
    expect(() => createProbeRegistry([makeCatalog(), other])).toThrow(
      'Catalog "other": duplicate probe name "foo"',
    );
  });

  it('returns an empty map for no catalogs', () => {
    expect(createProbeRegistry([]).size).toBe(0);
  });
});
