/**
 * MergedEntity — one logical node combining the same-path nodes of all
 * sources.
 *
 * This module handles:
 * - Combining per-source nodes (properties, schemas, bindings, children)
 * - Enforcing disjoint property names and an agreed enabled flag
 * - Contributing the entity's dependency edges to the graph
 *
 * It does NOT handle:
 * - Label uniqueness, ordinal assignment or lookup tables (that's the
 *   SettingsTree's job)
 */

import { MergeError, StateError } from '../errors.js';
import { matchesPattern } from '../binding/pattern.js';
import { pathIdentifier } from '../identifiers.js';
import { nameOf, parentPathOf } from '../tree/TreeNode.js';
import type { Binding } from '../binding/Binding.js';
import type { DependencyGraph } from '../graph/DependencyGraph.js';
import type { Property } from '../tree/Property.js';
import type { SourceNode, SourceTree } from '../tree/types.js';

/**
 * What an entity needs from the tree that owns it.
 */
export interface EntityRegistry {
  entityByPath(path: string): MergedEntity | undefined;
  /** Path of the entity carrying `label` as a public label */
  pathForLabel(label: string): string | undefined;
  dependenciesOf(path: string): string[];
  dependentsOf(path: string): string[];
}

interface Contribution {
  tree: SourceTree;
  node: SourceNode;
}

function unique<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}

export class MergedEntity {
  readonly name: string;
  readonly parentPath: string | null;

  private readonly contributions: Contribution[] = [];
  private readonly props = new Map<string, Property>();
  private ordinal?: number;

  constructor(
    readonly path: string,
    private readonly registry: EntityRegistry,
  ) {
    this.name = nameOf(path);
    this.parentPath = parentPathOf(path);
  }

  /**
   * Add the node of one more source at this path.
   */
  addNode(node: SourceNode, tree: SourceTree): void {
    for (const name of node.properties.keys()) {
      const owner = this.contributions.find(c => c.node.properties.has(name));
      if (owner !== undefined) {
        throw new MergeError(
          `property '${name}' is defined by both ${owner.tree.sourcePath} and ${tree.sourcePath}`,
          this.path,
        );
      }
    }
    const first = this.contributions[0];
    if (first !== undefined && first.node.enabled !== node.enabled) {
      throw new MergeError(
        `${first.tree.sourcePath} has the node ${first.node.enabled ? 'enabled' : 'disabled'}, ` +
          `but ${tree.sourcePath} has it ${node.enabled ? 'enabled' : 'disabled'}`,
        this.path,
      );
    }
    this.contributions.push({ node, tree });
    for (const [name, property] of node.properties) {
      this.props.set(name, property);
    }
  }

  /** Per-source nodes, in source order */
  get sourceNodes(): SourceNode[] {
    return this.contributions.map(c => c.node);
  }

  get sourcePaths(): string[] {
    return this.contributions.map(c => c.tree.sourcePath);
  }

  /**
   * The node of the first source whose nodes are instances of `cls`.
   */
  nodeOf<T extends SourceNode>(cls: abstract new (...args: never[]) => T): T | undefined {
    for (const { node } of this.contributions) {
      if (node instanceof cls) {
        return node;
      }
    }
    return undefined;
  }

  get parent(): MergedEntity | undefined {
    return this.parentPath === null ? undefined : this.registry.entityByPath(this.parentPath);
  }

  /**
   * Child entities of every source, in source order.
   */
  get children(): MergedEntity[] {
    const paths = unique(this.contributions.flatMap(c => c.node.childPaths));
    return paths.flatMap(path => this.registry.entityByPath(path) ?? []);
  }

  get properties(): ReadonlyMap<string, Property> {
    return this.props;
  }

  get schemas(): string[] {
    return unique(this.contributions.flatMap(c => c.node.schemas));
  }

  /** Label candidates that are unique across the merged tree */
  get labels(): string[] {
    return unique(this.contributions.flatMap(c => c.node.labels)).filter(
      label => this.registry.pathForLabel(label) === this.path,
    );
  }

  get labelCandidates(): string[] {
    return unique(this.contributions.flatMap(c => c.node.labels));
  }

  get enabled(): boolean {
    return this.contributions[0]?.node.enabled ?? true;
  }

  get bindings(): Binding[] {
    return unique(this.contributions.flatMap(c => c.node.bindings));
  }

  get matchingSchemas(): string[] {
    return unique(this.contributions.flatMap(c => c.node.matchingSchemas));
  }

  get bindingPaths(): string[] {
    return unique(this.contributions.flatMap(c => c.node.bindingPaths));
  }

  /** Description of the first matched binding */
  get description(): string | undefined {
    return this.bindings[0]?.description?.trim();
  }

  get hasChildBinding(): boolean {
    return this.bindings.some(binding => binding.childBindings.size > 0);
  }

  /** Identifier derived from the path, e.g. `N_S_soc_S_uart_1000` */
  get pathId(): string {
    return pathIdentifier(this.path);
  }

  /**
   * Position in dependency order: lower than that of every entity depending
   * on this one.
   */
  get dependencyOrdinal(): number {
    if (this.ordinal === undefined) {
      throw new StateError(`dependency ordinal not set for node ${this.path}`);
    }
    return this.ordinal;
  }

  /** Called by the owning tree once the graph has been ordered. */
  assignOrdinal(ordinal: number): void {
    if (this.ordinal !== undefined) {
      throw new StateError(`dependency ordinal of ${this.path} is already set`);
    }
    this.ordinal = ordinal;
  }

  /** Entities this one directly depends on */
  get dependsOn(): MergedEntity[] {
    return this.registry.dependenciesOf(this.path).flatMap(path => this.registry.entityByPath(path) ?? []);
  }

  /** Entities that directly depend on this one */
  get requiredBy(): MergedEntity[] {
    return this.registry.dependentsOf(this.path).flatMap(path => this.registry.entityByPath(path) ?? []);
  }

  /**
   * Add this entity's dependencies to `graph`: children depend on their
   * parent, the entity depends on what its properties reference.
   */
  addToGraph(graph: DependencyGraph): void {
    if (this.parentPath === null) {
      graph.addVertex(this.path);
    }
    for (const child of this.children) {
      graph.addEdge(child.path, this.path);
    }
    this.addBoundEdges(graph, this, this.bindings);
  }

  /**
   * Edges for the properties of `bound` matched by `bindings`. Children
   * matched by child bindings contribute to this entity too.
   */
  private addBoundEdges(graph: DependencyGraph, bound: MergedEntity, bindings: readonly Binding[]): void {
    for (const binding of bindings) {
      for (const pattern of binding.propertySpecs.keys()) {
        for (const property of bound.properties.values()) {
          if (!matchesPattern(pattern, property.name)) {
            continue;
          }
          const typed = property.typed;
          if (typed.kind === 'node-reference') {
            this.addDependency(graph, typed.value.path);
          } else if (typed.kind === 'node-reference-list') {
            typed.value.forEach(ref => this.addDependency(graph, ref.path));
          }
        }
      }

      for (const { node } of bound.contributions) {
        node.sourceDependencies(binding).forEach(path => this.addDependency(graph, path));
      }

      for (const [pattern, childBindings] of binding.childBindings) {
        for (const child of bound.children) {
          if (matchesPattern(pattern, child.name)) {
            this.addBoundEdges(graph, child, childBindings);
          }
        }
      }
    }

    for (const { node } of bound.contributions) {
      node.sourceDependencies().forEach(path => this.addDependency(graph, path));
    }
  }

  private addDependency(graph: DependencyGraph, target: string): void {
    if (target !== this.path) {
      graph.addEdge(this.path, target);
    }
  }

  toString(): string {
    const sources = this.sourcePaths.join(', ');
    const paths = this.bindingPaths;
    const binding = paths.length === 0 ? 'no binding' : `binding ${paths.join(', ')}`;
    return `<MergedEntity ${this.path} in '${sources}', ${binding}>`;
  }
}
