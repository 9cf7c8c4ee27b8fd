/**
 * Vendor prefix tables.
 *
 * Each non-comment line maps a schema vendor prefix to the vendor's name:
 * `<prefix><TAB><vendor>`. Lines starting with `#` and blank lines are
 * ignored.
 */

import { readFile } from 'node:fs/promises';
import { SourceError } from '../errors.js';

export function parseVendorPrefixes(text: string, sourcePath = '<vendor-prefixes>'): Map<string, string> {
  const prefixes = new Map<string, string>();
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }
    const tab = line.indexOf('\t');
    if (tab < 0) {
      throw new SourceError(`${sourcePath}:${index + 1}: expected '<prefix>\\t<vendor>', got '${line}'`);
    }
    prefixes.set(line.slice(0, tab), line.slice(tab + 1));
  });
  return prefixes;
}

/**
 * Load and combine vendor prefix files. Later files win for duplicate
 * prefixes.
 */
export async function loadVendorPrefixes(paths: string | readonly string[]): Promise<Map<string, string>> {
  const prefixes = new Map<string, string>();
  for (const path of typeof paths === 'string' ? [paths] : paths) {
    for (const [prefix, vendor] of parseVendorPrefixes(await readFile(path, 'utf-8'), path)) {
      prefixes.set(prefix, vendor);
    }
  }
  return prefixes;
}
