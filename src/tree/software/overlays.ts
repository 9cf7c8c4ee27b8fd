/**
 * Configuration overlays — merging a list of overlay documents into one
 * configuration document.
 *
 * Each overlay maps mount points to node maps. A mount point is either an
 * absolute path into the document built so far (missing nodes are created)
 * or the name of exactly one existing node, used as a label. Keys starting
 * with `x-` hold reusable snippets and are skipped.
 */

import { parse as parseYaml } from 'yaml';
import { SourceError } from '../../errors.js';
import { isYamlMap } from '../../binding/values.js';
import type { YamlMap } from '../../binding/types.js';

const SNIPPET_PREFIX = 'x-';

/**
 * Parse configuration text into its list of overlays.
 */
export function parseOverlays(text: string, sourcePath: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new SourceError(`invalid YAML in ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new SourceError(`expected a list of configuration overlays in ${sourcePath}`);
  }
  return parsed;
}

/**
 * Merge `overlay` into `target` in place. Maps merge recursively, each into
 * its own copy, so nodes shared through YAML aliases stay independent. Any
 * other value replaces what was there.
 */
function mergeInto(target: YamlMap, overlay: YamlMap): void {
  for (const [key, value] of Object.entries(overlay)) {
    if (isYamlMap(value)) {
      const existing = target[key];
      const child = isYamlMap(existing) ? existing : {};
      mergeInto(child, value);
      target[key] = child;
    } else {
      target[key] = structuredClone(value);
    }
  }
}

function nodeAtPath(root: YamlMap, mountPoint: string): YamlMap {
  let node = root;
  let path = '';
  for (const part of mountPoint.split('/').filter(p => p !== '')) {
    path += `/${part}`;
    const child = node[part] ?? {};
    if (!isYamlMap(child)) {
      throw new SourceError(`mount point '${mountPoint}' runs through property '${part}'`, path);
    }
    node[part] = child;
    node = child;
  }
  return node;
}

function collectNamed(node: YamlMap, name: string, found: YamlMap[]): void {
  for (const [key, value] of Object.entries(node)) {
    if (!isYamlMap(value)) {
      continue;
    }
    if (key === name) {
      found.push(value);
    }
    collectNamed(value, name, found);
  }
}

function nodeForLabel(root: YamlMap, label: string): YamlMap {
  const found: YamlMap[] = [];
  collectNamed(root, label, found);
  if (found.length === 0) {
    throw new SourceError(`target label '${label}' of overlay not found in configuration`);
  }
  if (found.length > 1) {
    throw new SourceError(`target label '${label}' of overlay is not unique in configuration`);
  }
  return found[0];
}

/**
 * Apply overlays in order and return the merged document. The overlays are
 * not modified.
 */
export function applyOverlays(overlays: readonly unknown[]): YamlMap {
  const root: YamlMap = {};
  for (const overlay of overlays) {
    if (!isYamlMap(overlay)) {
      throw new SourceError(`overlay ${JSON.stringify(overlay)} should be a map of mount points to configuration nodes`);
    }
    for (const [mountPoint, node] of Object.entries(overlay)) {
      if (mountPoint.startsWith(SNIPPET_PREFIX)) {
        continue;
      }
      if (!isYamlMap(node)) {
        throw new SourceError(`overlay for mount point '${mountPoint}' should be a configuration node`);
      }
      let target: YamlMap;
      if (mountPoint.startsWith('/')) {
        target = nodeAtPath(root, mountPoint);
      } else if (mountPoint.includes('/')) {
        throw new SourceError(
          `mount point '${mountPoint}' should be either an absolute path or a label not containing any slashes`,
        );
      } else {
        target = nodeForLabel(root, mountPoint);
      }
      mergeInto(target, node);
    }
  }
  return root;
}
