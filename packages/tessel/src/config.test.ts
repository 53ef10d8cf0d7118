import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE, DEFAULT_CONFIG, defineConfig, loadConfig, validateConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('validateConfig', () => {
  it('accepts an empty object', () => {
    expect(() => validateConfig({})).not.toThrow();
  });

  it('accepts a full config', () => {
    expect(() =>
      validateConfig({ outputDir: './out', cache: true, debugHeaders: false, debugLogs: true })
    ).not.toThrow();
  });

  it('rejects non-objects', () => {
    expect(() => validateConfig(null)).toThrow('[tessel] Config must be an object');
    expect(() => validateConfig([])).toThrow('[tessel] Config must be an object');
    expect(() => validateConfig('cache')).toThrow(ConfigError);
  });

  it('rejects an empty outputDir', () => {
    expect(() => validateConfig({ outputDir: '' })).toThrow(
      '[tessel] Config "outputDir" must be a non-empty string'
    );
  });

  it('rejects non-boolean flags', () => {
    expect(() => validateConfig({ cache: 'yes' })).toThrow(
      '[tessel] Config "cache" must be a boolean if provided'
    );
    expect(() => validateConfig({ debugLogs: 1 })).toThrow(
      '[tessel] Config "debugLogs" must be a boolean if provided'
    );
  });
});

describe('defineConfig', () => {
  it('returns the config unchanged', () => {
    const config = { cache: true };
    expect(defineConfig(config)).toBe(config);
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tessel-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', () => {
    expect(loadConfig(root)).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toEqual({
      outputDir: './cache',
      cache: false,
      debugHeaders: false,
      debugLogs: false,
    });
  });

  it('merges the file over the defaults', () => {
    fs.writeFileSync(
      path.join(root, CONFIG_FILE),
      JSON.stringify({ outputDir: './out', debugHeaders: true })
    );
    expect(loadConfig(root)).toEqual({
      outputDir: './out',
      cache: false,
      debugHeaders: true,
      debugLogs: false,
    });
  });

  it('throws a ConfigError on malformed JSON', () => {
    fs.writeFileSync(path.join(root, CONFIG_FILE), '{ cache: ');
    expect(() => loadConfig(root)).toThrow(ConfigError);
  });

  it('throws a ConfigError on invalid values', () => {
    fs.writeFileSync(path.join(root, CONFIG_FILE), JSON.stringify({ cache: 'on' }));
    expect(() => loadConfig(root)).toThrow('Config "cache" must be a boolean');
  });
});
