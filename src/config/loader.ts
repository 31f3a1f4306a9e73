import { access, readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Error ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.outing.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is unreadable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}: ${message}`);
  }

  return parseConfigText(raw, configPath.endsWith('.json') ? 'json' : 'yaml');
}

/**
 * Like loadConfigFile, but a missing file yields an empty config.
 * Used for the default config path, which need not exist.
 */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig> {
  try {
    await access(configPath);
  } catch {
    return fileConfigSchema.parse({});
  }
  return loadConfigFile(configPath);
}

export function parseConfigText(
  raw: string,
  format: 'json' | 'yaml',
): FileConfig {
  let parsed: unknown;
  try {
    parsed = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config is not valid ${format.toUpperCase()}: ${message}`);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${result.error.message}`);
  }
  return result.data;
}
