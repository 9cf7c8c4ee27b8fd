/**
 * Tests for building a settings tree from a configuration file.
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { buildSettingsTree } from './build.js';
import { loadConfig } from './config/loader.js';
import { SchemaError } from './errors.js';
import { cells, defineHardwareTree, strings } from './tree/hardware/raw.js';
import type { SettingsConfig } from './config/types.js';

const FIXTURES = fileURLToPath(new URL('../test/fixtures/build/', import.meta.url));

const BOARD = defineHardwareTree(
  {
    props: { '#address-cells': cells(1), '#size-cells': cells(1), compatible: strings('acme,board') },
    children: {
      'uart@2000': {
        labels: ['uart0'],
        props: { compatible: strings('acme,uart'), reg: cells(0x2000, 0x10), 'current-speed': cells(115200) },
      },
    },
  },
  'board.dts',
);

async function fixtureConfig(): Promise<SettingsConfig> {
  return loadConfig({ configPath: join(FIXTURES, 'settings.yaml') });
}

describe('buildSettingsTree', () => {
  it('merges the hardware tree with the configured software sources', async () => {
    const tree = await buildSettingsTree(await fixtureConfig(), BOARD);

    expect(tree.state).toBe('processed');
    expect(tree.entities.map(e => e.path)).toEqual(['/', '/uart@2000', '/app']);
    expect(tree.entityByPath('/app')?.properties.get('console')?.value).toEqual({ path: '/uart@2000' });
    expect(tree.entityByPath('/app')?.properties.get('buffer-size')?.value).toBe(256);
    expect(tree.entities.map(e => e.dependencyOrdinal)).toEqual([0, 1, 2]);
  });

  it('loads vendor prefixes', async () => {
    const tree = await buildSettingsTree(await fixtureConfig(), BOARD);
    expect(tree.vendorOf('acme,uart')).toBe('Acme Corp');
    expect(tree.modelOf('acme,app')).toBe('app');
  });

  it('builds from the hardware tree alone', async () => {
    const config: SettingsConfig = { ...(await fixtureConfig()), software: undefined };
    const tree = await buildSettingsTree(config, BOARD);

    expect(tree.entities.map(e => e.path)).toEqual(['/', '/uart@2000']);
    expect(tree.sourceOf('software')).toBeUndefined();
  });

  it('raises unknown vendors in strict mode', async () => {
    const config = { ...(await fixtureConfig()), strict: true, vendorPrefixes: [join(FIXTURES, 'other-vendors.txt')] };
    await expect(buildSettingsTree(config, BOARD)).rejects.toThrow(SchemaError);
    await expect(buildSettingsTree(config, BOARD)).rejects.toThrow(
      "/uart@2000: schema 'acme,uart' has unknown vendor prefix 'acme'",
    );
  });

  it('only warns about unknown vendors otherwise', async () => {
    const config = { ...(await fixtureConfig()), vendorPrefixes: [join(FIXTURES, 'other-vendors.txt')] };
    const tree = await buildSettingsTree(config, BOARD);
    expect(tree.diagnostics.warnings('unknown-vendor').map(d => d.path)).toEqual(['/uart@2000', '/app']);
  });
});
