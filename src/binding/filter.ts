/**
 * Property filtering for `include:` entries.
 *
 * This module handles:
 * - Parsing `property-allowlist`, `property-blocklist` and nested
 *   `child-binding` filters
 * - Rejecting filters that combine an allowlist with a blocklist
 * - Applying filters to the `properties:` of an included document
 */

import { SchemaError } from '../errors.js';
import { matchesPattern } from './pattern.js';
import { isStringList, isYamlMap } from './values.js';
import type { PropertyFilter, YamlMap } from './types.js';

const FILTER_KEYS = new Set(['property-allowlist', 'property-blocklist', 'child-binding']);

/**
 * Read an optional filter list.
 */
export function readFilterList(key: string, value: unknown, bindingPath: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isStringList(value)) {
    throw new SchemaError(`'${key}' value should be a list`, bindingPath);
  }
  return value;
}

/**
 * Combine an include entry's list with the one propagated by the includer.
 */
export function mergeFilterList(additional: string[] | undefined, previous: string[] | undefined): string[] | undefined {
  if (additional === undefined) {
    return previous;
  }
  return [...additional, ...(previous ?? [])];
}

/**
 * Validate and parse a nested `child-binding:` filter of an include entry.
 * Every level is checked before the included file is read.
 */
export function parseChildFilter(raw: unknown, includeName: string, bindingPath: string): PropertyFilter | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isYamlMap(raw)) {
    throw new SchemaError(`'include:' of file '${includeName}' has a malformed 'child-binding'`, bindingPath);
  }
  const unexpected = Object.keys(raw).filter(key => !FILTER_KEYS.has(key));
  if (unexpected.length > 0) {
    throw new SchemaError(
      `'include:' of file '${includeName}' should not have these unexpected contents in a 'child-binding': ${unexpected.join(', ')}`,
      bindingPath,
    );
  }
  const allowlist = readFilterList('property-allowlist', raw['property-allowlist'], bindingPath);
  const blocklist = readFilterList('property-blocklist', raw['property-blocklist'], bindingPath);
  if (allowlist !== undefined && blocklist !== undefined) {
    throw new SchemaError(
      `'include:' of file '${includeName}' should not specify both 'property-allowlist:' and 'property-blocklist:' in a 'child-binding:'`,
      bindingPath,
    );
  }
  const filter: PropertyFilter = {};
  if (allowlist !== undefined) filter.allowlist = allowlist;
  if (blocklist !== undefined) filter.blocklist = blocklist;
  const child = parseChildFilter(raw['child-binding'], includeName, bindingPath);
  if (child !== undefined) filter.child = child;
  return filter;
}

/**
 * Check the top level of an include entry's filter.
 */
export function checkIncludeFilter(
  includeName: string | undefined,
  allowlist: string[] | undefined,
  blocklist: string[] | undefined,
  bindingPath: string,
): asserts includeName is string {
  if (includeName === undefined) {
    throw new SchemaError("'include:' element should have a 'name' key", bindingPath);
  }
  if (allowlist !== undefined && blocklist !== undefined) {
    throw new SchemaError(
      `'include:' of file '${includeName}' should not specify both 'property-allowlist:' and 'property-blocklist:'`,
      bindingPath,
    );
  }
}

function isChildNodeDeclaration(decl: unknown): decl is YamlMap {
  return isYamlMap(decl) && decl.type === 'node';
}

/**
 * Filter a `properties:` map in place.
 *
 * Child-node declarations are never removed by the lists; the child filter
 * applies to their own `properties:`.
 */
export function filterProperties(props: unknown, filter: PropertyFilter): void {
  if (!isYamlMap(props)) {
    return;
  }

  const toAdd: YamlMap = {};
  const toDelete = new Set<string>();
  const { allowlist, blocklist } = filter;

  if (allowlist !== undefined) {
    for (const [name, decl] of Object.entries(props)) {
      if (isChildNodeDeclaration(decl) || allowlist.includes(name)) {
        continue;
      }
      toDelete.add(name);
      // A pattern matching an allowed name becomes an exact entry.
      for (const allowKey of allowlist) {
        if (matchesPattern(name, allowKey) && !(allowKey in props)) {
          toAdd[allowKey] = structuredClone(decl);
        }
      }
    }
  } else if (blocklist !== undefined) {
    for (const [name, decl] of Object.entries(props)) {
      if (isChildNodeDeclaration(decl)) {
        continue;
      }
      if (blocklist.includes(name)) {
        toDelete.add(name);
        continue;
      }
      let restricted = name;
      for (const blockKey of blocklist) {
        if (matchesPattern(name, blockKey)) {
          toDelete.add(name);
          restricted = `(?!^${blockKey}$)${restricted}`;
        }
      }
      if (!(restricted in props)) {
        toAdd[restricted] = decl;
      }
    }
  }

  for (const name of toDelete) {
    delete props[name];
  }
  Object.assign(props, toAdd);

  if (filter.child === undefined) {
    return;
  }
  for (const decl of Object.values(props)) {
    if (isChildNodeDeclaration(decl)) {
      filterProperties(decl.properties, filter.child);
    }
  }
}
