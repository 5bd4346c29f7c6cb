import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CONFIG_DIR_NAME, ProbekitConfig } from '@probekit/shared';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** ~/.probekit, or $PROBEKIT_CONFIG_DIR when set */
export function getConfigDir(): string {
  return process.env.PROBEKIT_CONFIG_DIR ?? path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

/**
 * Reads and validates the config file.
 * A missing file yields an empty config; anything unreadable throws ConfigError.
 */
export function loadConfig(file: string = getConfigPath()): ProbekitConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err: unknown) {
    if (errorCode(err) === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config at ${file}. Check file permissions.`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Config file corrupted at ${file}.`);
  }

  const parsed = ProbekitConfig.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config at ${file}: ${issues}`);
  }
  return parsed.data;
}

export function saveConfig(config: ProbekitConfig, file: string = getConfigPath()): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}
