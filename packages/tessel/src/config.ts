import fs from 'node:fs';
import path from 'node:path';
import type { TesselConfig } from './types.js';
import { ConfigError } from './errors.js';

export const CONFIG_FILE = 'tessel.config.json';

export const DEFAULT_CONFIG: TesselConfig = {
  outputDir: './cache',
  cache: false,
  debugHeaders: false,
  debugLogs: false,
};

export function defineConfig(config: Partial<TesselConfig>): Partial<TesselConfig> {
  return config;
}

export function validateConfig(
  config: unknown
): asserts config is Partial<TesselConfig> {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    throw new ConfigError('Config must be an object');
  }

  const cfg = config as Record<string, unknown>;

  if (
    cfg.outputDir !== undefined &&
    (typeof cfg.outputDir !== 'string' || !cfg.outputDir)
  ) {
    throw new ConfigError('Config "outputDir" must be a non-empty string');
  }

  for (const flag of ['cache', 'debugHeaders', 'debugLogs'] as const) {
    if (cfg[flag] !== undefined && typeof cfg[flag] !== 'boolean') {
      throw new ConfigError(`Config "${flag}" must be a boolean if provided`);
    }
  }
}

/**
 * Read tessel.config.json from the site root. A missing file yields the
 * defaults; a malformed one throws.
 */
export function loadConfig(root: string, file = CONFIG_FILE): TesselConfig {
  const configPath = path.resolve(root, file);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}`, { cause: err });
  }

  validateConfig(parsed);
  return { ...DEFAULT_CONFIG, ...parsed };
}
