/**
 * Tests for the configuration loader.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, loadConfig, parseConfig, validateConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('validateConfig', () => {
  it('returns defaults for an empty document', () => {
    expect(validateConfig(null)).toEqual(DEFAULT_CONFIG);
  });

  it('accepts a single string where a list is expected', () => {
    const config = validateConfig({ hardware: { bindingsDirs: 'bindings' } });
    expect(config.hardware.bindingsDirs).toEqual(['bindings']);
    expect(config.hardware.warnRegUnitAddressMismatch).toBe(true);
  });

  it('rejects an unknown log level', () => {
    expect(() => validateConfig({ logLevel: 'loud' })).toThrow(ConfigValidationError);
  });

  it('reports the offending path', () => {
    try {
      validateConfig({ hardware: { inferBindingForPaths: ['acme,user'] } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.path).toBe('hardware.inferBindingForPaths[0]');
        expect(err.value).toBe('acme,user');
      }
    }
  });

  it('requires sources for a software section', () => {
    expect(() => validateConfig({ software: { bindingsDirs: ['b'] } })).toThrow(/sources is required/);
  });
});

describe('parseConfig', () => {
  const saved = process.env.SETTINGS_TEST_DIR;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.SETTINGS_TEST_DIR;
    } else {
      process.env.SETTINGS_TEST_DIR = saved;
    }
  });

  it('substitutes environment variables and resolves paths', () => {
    process.env.SETTINGS_TEST_DIR = 'hw';
    const config = parseConfig(
      [
        'strict: true',
        'hardware:',
        '  bindingsDirs:',
        '    - "${SETTINGS_TEST_DIR}/bindings"',
        'software:',
        '  sources: "${SW_SOURCE:-app.yaml}"',
      ].join('\n'),
      '/work',
    );

    expect(config.strict).toBe(true);
    expect(config.hardware.bindingsDirs).toEqual(['/work/hw/bindings']);
    expect(config.software).toEqual({ sources: ['/work/app.yaml'], bindingsDirs: [] });
  });
});

describe('loadConfig', () => {
  it('falls back to defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: '/nonexistent/settings.yaml' });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('reads a file from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'settings-config-'));
    try {
      await writeFile(join(dir, 'settings.yaml'), 'vendorPrefixes: vendor-prefixes.txt\n');
      const config = await loadConfig({ configPath: join(dir, 'settings.yaml') });
      expect(config.vendorPrefixes).toEqual([join(dir, 'vendor-prefixes.txt')]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
