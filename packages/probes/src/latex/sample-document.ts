import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { FunctionalCheck } from '../types.js';

const SAMPLE_FILENAME = 'sample.tex';

export const SAMPLE_DOCUMENT = [
  '\\documentclass{article}',
  '\\begin{document}',
  '$\\alpha+2$',
  '\\end{document}',
].join('\n');

/**
 * Typesets a minimal document in a fresh scratch directory.
 * Only the exit status is inspected; the directory is removed afterwards.
 */
export const compileSampleDocument: FunctionalCheck = async (probe, executablePath, env) => {
  const scratchDir = await mkdtemp(path.join(os.tmpdir(), 'probekit-'));
  try {
    await writeFile(path.join(scratchDir, SAMPLE_FILENAME), SAMPLE_DOCUMENT, 'utf-8');
    const status = await env.run(
      executablePath,
      ['-interaction=nonstopmode', SAMPLE_FILENAME],
      { cwd: scratchDir },
    );
    if (status === 0) return { ok: true };
    return {
      ok: false,
      reason: `Running ${probe.command} on a sample file returned non-zero exit status ${status}`,
    };
  } finally {
    await rm(scratchDir, { recursive: true, force: true });
  }
};
