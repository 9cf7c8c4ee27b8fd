/**
 * TreeNode — one node of a partial tree.
 *
 * This module handles:
 * - Identity (path, name, parent and child paths)
 * - Holding the raw property values delivered by the source
 * - Holding matched bindings and the resolved properties
 *
 * It does NOT handle:
 * - Matching bindings or resolving values (that's the PartialTree's job)
 */

import type { Binding } from '../binding/Binding.js';
import type { PropertySpec } from '../binding/PropertySpec.js';
import type { Property } from './Property.js';
import type { SourceNode } from './types.js';

/**
 * Parent path of an absolute path, or null for the root.
 */
export function parentPathOf(path: string): string | null {
  if (path === '/') {
    return null;
  }
  return path.slice(0, path.lastIndexOf('/')) || '/';
}

/**
 * Last component of an absolute path; the root is named "/".
 */
export function nameOf(path: string): string {
  return path === '/' ? '/' : path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Number of components below the root.
 */
export function depthOf(path: string): number {
  return path === '/' ? 0 : path.split('/').length - 1;
}

export abstract class TreeNode<R> implements SourceNode {
  readonly name: string;
  readonly parentPath: string | null;
  readonly childPaths: string[] = [];

  private boundBindings: Binding[] = [];
  private matched: string[] = [];
  private readonly specMap = new Map<string, PropertySpec>();
  private readonly props = new Map<string, Property>();

  constructor(
    readonly path: string,
    /** Raw property name -> raw value, in source order */
    protected readonly raw: ReadonlyMap<string, R>,
    readonly schemas: readonly string[],
  ) {
    this.name = nameOf(path);
    this.parentPath = parentPathOf(path);
  }

  abstract get enabled(): boolean;

  abstract get labels(): readonly string[];

  get properties(): ReadonlyMap<string, Property> {
    return this.props;
  }

  get bindings(): readonly Binding[] {
    return this.boundBindings;
  }

  get matchingSchemas(): readonly string[] {
    return this.matched;
  }

  get bindingPaths(): string[] {
    return this.boundBindings.map(binding => binding.path);
  }

  /** Property name pattern -> spec, combined over all matched bindings */
  get specs(): ReadonlyMap<string, PropertySpec> {
    return this.specMap;
  }

  get rawPropertyNames(): string[] {
    return [...this.raw.keys()];
  }

  rawValue(name: string): R | undefined {
    return this.raw.get(name);
  }

  hasRaw(name: string): boolean {
    return this.raw.has(name);
  }

  /**
   * Record the matched bindings. Earlier bindings take precedence.
   */
  attachBindings(bindings: Binding[], matchingSchemas: string[]): void {
    this.boundBindings = bindings;
    this.matched = matchingSchemas;
    for (const binding of [...bindings].reverse()) {
      for (const [pattern, spec] of binding.propertySpecs) {
        this.specMap.set(pattern, spec);
      }
    }
  }

  setProperty(property: Property): void {
    this.props.set(property.name, property);
  }

  sourceDependencies(_binding?: Binding): string[] {
    return [];
  }

  toString(): string {
    const paths = this.bindingPaths;
    const binding = paths.length === 0 ? 'no binding' : `binding ${paths.join(', ')}`;
    return `<${this.constructor.name} ${this.path}, ${binding}>`;
  }
}
