import { executable } from '@probekit/probes';
import { absentResult, presentResult } from '@probekit/shared';
import { describe, expect, it, vi } from 'vitest';
import { ProbeCache } from './cache.js';

describe('ProbeCache', () => {
  it('computes once and returns the stored evaluation afterwards', async () => {
    const cache = new ProbeCache();
    const probe = executable('latex');
    const compute = vi.fn().mockResolvedValue({ result: presentResult('latex'), path: '/bin/latex' });

    const first = await cache.getOrCompute(probe, 'present', compute);
    const second = await cache.getOrCompute(probe, 'present', compute);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
    expect(cache.has(probe, 'present')).toBe(true);
  });

  it('keeps presence and functional verdicts apart', async () => {
    const cache = new ProbeCache();
    const probe = executable('latex');

    await cache.getOrCompute(probe, 'present', async () => ({ result: presentResult('latex') }));
    const functional = await cache.getOrCompute(probe, 'functional', async () => ({
      result: absentResult('latex', 'broken'),
    }));

    expect(functional.result.present).toBe(false);
    expect(cache.size).toBe(2);
  });

  it('treats separately constructed probes with the same name as one entry', async () => {
    const cache = new ProbeCache();
    const compute = vi.fn().mockResolvedValue({ result: presentResult('dvips') });

    await cache.getOrCompute(executable('dvips'), 'present', compute);
    await cache.getOrCompute(executable('dvips'), 'present', compute);

    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('shares an in-flight computation between concurrent callers', async () => {
    const cache = new ProbeCache();
    const probe = executable('xelatex');
    const compute = vi.fn(async () => ({ result: presentResult('xelatex') }));

    const [a, b] = await Promise.all([
      cache.getOrCompute(probe, 'present', compute),
      cache.getOrCompute(probe, 'present', compute),
    ]);

    expect(compute).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
  });

  it('does not keep rejected computations', async () => {
    const cache = new ProbeCache();
    const probe = executable('lualatex');

    await expect(
      cache.getOrCompute(probe, 'present', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(cache.has(probe, 'present')).toBe(false);
    const retry = await cache.getOrCompute(probe, 'present', async () => ({
      result: presentResult('lualatex'),
    }));
    expect(retry.result.present).toBe(true);
  });

  it('builds keys from level, kind and name', () => {
    expect(ProbeCache.keyOf(executable('latex'), 'functional')).toBe('functional:executable:latex');
  });
});
