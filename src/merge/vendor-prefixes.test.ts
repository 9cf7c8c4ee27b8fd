/**
 * Tests for vendor prefix tables.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadVendorPrefixes, parseVendorPrefixes } from './vendor-prefixes.js';
import { SourceError } from '../errors.js';

describe('parseVendorPrefixes', () => {
  it('maps prefixes to vendor names', () => {
    const text = '# vendors\n\nacme\tAcme Corp\nother\tOther Inc.\n';
    expect([...parseVendorPrefixes(text)]).toEqual([
      ['acme', 'Acme Corp'],
      ['other', 'Other Inc.'],
    ]);
  });

  it('keeps everything after the first tab', () => {
    expect(parseVendorPrefixes('acme\tAcme\tLabs').get('acme')).toBe('Acme\tLabs');
  });

  it('rejects lines without a tab', () => {
    expect(() => parseVendorPrefixes('acme\tAcme Corp\nbroken line', 'vendors.txt')).toThrow(SourceError);
    expect(() => parseVendorPrefixes('acme\tAcme Corp\nbroken line', 'vendors.txt')).toThrow(
      "vendors.txt:2: expected '<prefix>\\t<vendor>', got 'broken line'",
    );
  });
});

describe('loadVendorPrefixes', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) {
      await rm(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('combines files with later files winning', async () => {
    dir = await mkdtemp(join(tmpdir(), 'vendor-prefixes-'));
    const base = join(dir, 'base.txt');
    const extra = join(dir, 'extra.txt');
    await writeFile(base, 'acme\tAcme Corp\nother\tOther Inc.\n');
    await writeFile(extra, 'acme\tAcme Labs\n');

    const prefixes = await loadVendorPrefixes([base, extra]);
    expect(prefixes.get('acme')).toBe('Acme Labs');
    expect(prefixes.get('other')).toBe('Other Inc.');
    expect((await loadVendorPrefixes(base)).get('acme')).toBe('Acme Corp');
  });
});
