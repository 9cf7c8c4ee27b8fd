/**
 * Name patterns used by property and child-binding declarations.
 *
 * Patterns are regular expressions matched at the start of the name only,
 * so `gpio` matches `gpios` and `.*` matches everything.
 */

import { SchemaError } from '../errors.js';

const compiled = new Map<string, RegExp>();

/**
 * Compile a name pattern anchored at the start.
 */
export function compilePattern(pattern: string): RegExp {
  let re = compiled.get(pattern);
  if (re === undefined) {
    try {
      re = new RegExp(`^(?:${pattern})`);
    } catch (err) {
      throw new SchemaError(`invalid name pattern '${pattern}': ${err instanceof Error ? err.message : String(err)}`);
    }
    compiled.set(pattern, re);
  }
  return re;
}

export function matchesPattern(pattern: string, name: string): boolean {
  return compilePattern(pattern).test(name);
}
