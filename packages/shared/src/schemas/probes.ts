import { z } from 'zod';

/**
 * Installation hint attached to a probe. Only used to explain
 * how a missing capability could be obtained.
 */
export const InstallHint = z.object({
  /** Distribution package providing the capability, e.g. "texlive" */
  package: z.string().min(1).optional(),
  /** Where installation instructions live */
  url: z.string().url().optional(),
});
export type InstallHint = z.infer<typeof InstallHint>;

/**
 * Verdict of a single probe evaluation.
 * `reason` and `resolution` are only set on negative results.
 */
export const ProbeResult = z.object({
  /** Name of the probe that produced this result */
  name: z.string(),
  present: z.boolean(),
  /** Why the capability is missing, suitable for display */
  reason: z.string().min(1).optional(),
  /** How the capability could be installed */
  resolution: z.string().optional(),
});
export type ProbeResult = Readonly<z.infer<typeof ProbeResult>>;

export function presentResult(name: string): ProbeResult {
  return Object.freeze({ name, present: true });
}

export function absentResult(name: string, reason: string, hint?: InstallHint): ProbeResult {
  const resolution = hint ? formatResolution(name, hint) : undefined;
  return Object.freeze(
    resolution ? { name, present: false, reason, resolution } : { name, present: false, reason },
  );
}

/** Results are compared by subject and verdict only */
export function sameVerdict(a: ProbeResult, b: ProbeResult): boolean {
  return a.name === b.name && a.present === b.present;
}

export function formatResolution(name: string, hint: InstallHint): string | undefined {
  const parts: string[] = [];
  if (hint.package) {
    parts.push(`To install ${name} you can try to install the '${hint.package}' package.`);
  }
  if (hint.url) {
    parts.push(`Further installation instructions might be available at ${hint.url}.`);
  }
  return parts.length > 0 ? parts.join(' ') : undefined;
}
