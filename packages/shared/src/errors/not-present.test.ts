import { describe, expect, it } from 'vitest';
import { absentResult } from '../schemas/probes.js';
import { ProbeNotPresentError } from './not-present.js';

describe('ProbeNotPresentError', () => {
  it('formats name, reason and resolution on separate lines', () => {
    const result = absentResult('latex_package_graphics', "'graphics.sty' not found by kpsewhich", {
      package: 'texlive',
    });
    const err = new ProbeNotPresentError(result);

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ProbeNotPresentError');
    expect(err.result).toBe(result);
    expect(err.message).toBe(
      'latex_package_graphics is not available.\n' +
        "'graphics.sty' not found by kpsewhich\n" +
        "To install latex_package_graphics you can try to install the 'texlive' package.",
    );
  });

  it('omits the resolution line without an install hint', () => {
    const err = new ProbeNotPresentError(
      absentResult('xelatex', "Executable 'xelatex' not found on PATH."),
    );

    expect(err.message).toBe("xelatex is not available.\nExecutable 'xelatex' not found on PATH.");
  });
});
