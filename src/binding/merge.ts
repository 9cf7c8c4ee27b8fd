/**
 * Merging of binding documents for `include:`.
 */

import { isDeepStrictEqual } from 'node:util';
import { SchemaError } from '../errors.js';
import { isYamlMap } from './values.js';
import type { YamlMap } from './types.js';

/**
 * Keys an including document may silently override. Dialects extend this
 * set (hardware bindings add `compatible`).
 */
export const OVERRIDABLE_KEYS: ReadonlySet<string> = new Set(['title', 'description', 'schema']);

function show(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * True where it is wrong for `toValue` to take precedence over `fromValue`.
 */
export function isBadOverwrite(
  key: string,
  toValue: unknown,
  fromValue: unknown,
  checkRequired: boolean,
  overridable: ReadonlySet<string> = OVERRIDABLE_KEYS,
): boolean {
  if (isDeepStrictEqual(toValue, fromValue)) {
    return false;
  }
  if (overridable.has(key)) {
    return false;
  }
  if (key === 'required') {
    return checkRequired && Boolean(fromValue) && !toValue;
  }
  return true;
}

/**
 * Recursively merge `from` into `to`, in place. Values already in `to` win.
 *
 * `required:` values are OR-ed. With `checkRequired`, `to` may not relax a
 * `required: true` coming from `from`.
 */
export function mergeDocuments(
  bindingPath: string,
  to: YamlMap,
  from: YamlMap,
  checkRequired: boolean,
  overridable: ReadonlySet<string> = OVERRIDABLE_KEYS,
  parentKey?: string,
): void {
  for (const [key, fromValue] of Object.entries(from)) {
    const toValue = to[key];
    if (isYamlMap(toValue) && isYamlMap(fromValue)) {
      mergeDocuments(bindingPath, toValue, fromValue, checkRequired, overridable, key);
    } else if (!(key in to)) {
      to[key] = fromValue;
    } else if (isBadOverwrite(key, toValue, fromValue, checkRequired, overridable)) {
      throw new SchemaError(
        `(in '${parentKey ?? ''}'): '${key}' from included file overwritten ` +
          `('${show(fromValue)}' replaced with '${show(toValue)}')`,
        bindingPath,
      );
    } else if (key === 'required') {
      if (typeof toValue !== 'boolean' || typeof fromValue !== 'boolean') {
        throw new SchemaError(
          `malformed 'required:' setting for '${parentKey ?? ''}' in 'properties', expected true/false`,
          bindingPath,
        );
      }
      to.required = toValue || fromValue;
    }
  }
}
