import { execFile } from 'node:child_process';
import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import type { ProbeEnvironment, RunOptions } from '@probekit/probes';
import { DEFAULT_EXEC_TIMEOUT_MS } from '@probekit/shared';

const execFileAsync = promisify(execFile);

export interface SystemEnvironmentOptions {
  /** Kill any spawned resolver or program after this many ms */
  timeoutMs?: number;
  /** Directories searched for executables; defaults to $PATH */
  searchPath?: string;
}

/** Exit status of a process that ran to completion, undefined otherwise */
function exitCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

function wasKilled(error: unknown): boolean {
  return error instanceof Error && 'killed' in error && error.killed === true;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    await access(candidate, constants.X_OK);
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * First executable file named `command` in the given search path.
 * Only inspects the file system; nothing is spawned.
 */
export async function findOnPath(
  command: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | undefined> {
  if (!command) return undefined;
  if (command.includes(path.sep)) {
    return path.isAbsolute(command) && (await isExecutableFile(command)) ? command : undefined;
  }
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.resolve(dir, command);
    if (await isExecutableFile(candidate)) return candidate;
  }
  return undefined;
}

/** Real environment using PATH lookup and child processes */
export function createSystemEnvironment(options: SystemEnvironmentOptions = {}): ProbeEnvironment {
  const timeout = options.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS;

  function failure(command: string, error: unknown): Error {
    if (wasKilled(error)) return new Error(`${command} timed out after ${timeout}ms`);
    return error instanceof Error ? error : new Error(`${command} failed`);
  }

  return {
    which(command: string): Promise<string | undefined> {
      return findOnPath(command, options.searchPath);
    },

    async resolveFile(resolver: string, filename: string): Promise<string | undefined> {
      try {
        const { stdout } = await execFileAsync(resolver, [filename], {
          timeout,
          maxBuffer: 1024 * 1024,
        });
        return stdout.trim() || undefined;
      } catch (error) {
        if (exitCodeOf(error) !== undefined) return undefined;
        throw failure(resolver, error);
      }
    },

    async run(command: string, args: string[], { cwd }: RunOptions): Promise<number> {
      try {
        await execFileAsync(command, args, { cwd, timeout, maxBuffer: 16 * 1024 * 1024 });
        return 0;
      } catch (error) {
        const code = exitCodeOf(error);
        if (code !== undefined) return code;
        throw failure(command, error);
      }
    },
  };
}
