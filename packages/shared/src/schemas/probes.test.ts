import { describe, expect, it } from 'vitest';
import {
  ProbeResult,
  absentResult,
  formatResolution,
  presentResult,
  sameVerdict,
} from './probes.js';

describe('presentResult', () => {
  it('carries no reason', () => {
    const result = presentResult('pdflatex');

    expect(result).toEqual({ name: 'pdflatex', present: true });
    expect(result.reason).toBeUndefined();
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('absentResult', () => {
  it('keeps the reason and omits resolution without a hint', () => {
    const result = absentResult('xelatex', "Executable 'xelatex' not found on PATH.");

    expect(result).toEqual({
      name: 'xelatex',
      present: false,
      reason: "Executable 'xelatex' not found on PATH.",
    });
    expect('resolution' in result).toBe(false);
  });

  it('builds a resolution from the install hint', () => {
    const result = absentResult('latex', 'missing', {
      package: 'texlive',
      url: 'https://www.latex-project.org/',
    });

    expect(result.resolution).toBe(
      "To install latex you can try to install the 'texlive' package. " +
        'Further installation instructions might be available at https://www.latex-project.org/.',
    );
  });

  it('produces values accepted by the ProbeResult schema', () => {
    const parsed = ProbeResult.safeParse(absentResult('x', 'gone', { package: 'pkg' }));
    expect(parsed.success).toBe(true);
  });
});

describe('formatResolution', () => {
  it('returns undefined for an empty hint', () => {
    expect(formatResolution('latex', {})).toBeUndefined();
  });

  it('mentions only the url when no package is known', () => {
    expect(formatResolution('latex', { url: 'https://example.org/tex' })).toBe(
      'Further installation instructions might be available at https://example.org/tex.',
    );
  });
});

describe('sameVerdict', () => {
  it('ignores the reason text', () => {
    expect(sameVerdict(absentResult('a', 'one'), absentResult('a', 'two'))).toBe(true);
  });

  it('distinguishes names and verdicts', () => {
    expect(sameVerdict(presentResult('a'), presentResult('b'))).toBe(false);
    expect(sameVerdict(presentResult('a'), absentResult('a', 'gone'))).toBe(false);
  });
});
