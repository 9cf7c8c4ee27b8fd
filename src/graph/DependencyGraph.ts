/**
 * DependencyGraph — directed dependency graph over path-keyed vertices.
 *
 * This module handles:
 * - Recording "source requires target" edges
 * - Computing strongly connected components with Tarjan's algorithm, in
 *   dependency order (no component depends on a later one)
 * - Direct dependency and dependent lookups
 *
 * Vertices are identified by string keys. Ordering between vertices (roots
 * and edge targets) follows the caller-supplied sort key, so the result is
 * deterministic for a given graph.
 */

import { GraphError } from '../errors.js';

/**
 * Sort key of a vertex. Keys are compared element by element.
 */
export type SortKey = readonly string[];

function compareKeys(a: SortKey, b: SortKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? '';
    const y = b[i] ?? '';
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return a.length - b.length;
}

/**
 * Sort key for tree paths: (parent path, node name).
 */
export function pathSortKey(path: string): SortKey {
  const slash = path.lastIndexOf('/');
  const parent = path.slice(0, slash) || '/';
  return [parent, path.slice(slash + 1)];
}

export class DependencyGraph {
  private readonly vertices = new Set<string>();
  private readonly edges = new Map<string, Set<string>>();
  private readonly reverseEdges = new Map<string, Set<string>>();
  private sccs: string[][] | null = null;

  constructor(
    private readonly sortKey: (vertex: string) => SortKey = pathSortKey,
    private readonly explicitRoot?: string,
  ) {}

  get size(): number {
    return this.vertices.size;
  }

  has(vertex: string): boolean {
    return this.vertices.has(vertex);
  }

  /**
   * Add a vertex without any dependency.
   */
  addVertex(vertex: string): void {
    if (!this.vertices.has(vertex)) {
      this.vertices.add(vertex);
      this.sccs = null;
    }
  }

  /**
   * Record that `source` requires `target`. Both vertices are added.
   */
  addEdge(source: string, target: string): void {
    let targets = this.edges.get(source);
    if (targets === undefined) {
      targets = new Set();
      this.edges.set(source, targets);
    }
    targets.add(target);

    if (source !== target) {
      let sources = this.reverseEdges.get(target);
      if (sources === undefined) {
        sources = new Set();
        this.reverseEdges.set(target, sources);
      }
      sources.add(source);
    }

    this.vertices.add(source);
    this.vertices.add(target);
    this.sccs = null;
  }

  /**
   * Vertices `vertex` directly depends on, sorted.
   */
  dependsOn(vertex: string): string[] {
    return this.sorted(this.edges.get(vertex) ?? []);
  }

  /**
   * Vertices that directly depend on `vertex`, sorted.
   */
  requiredBy(vertex: string): string[] {
    return this.sorted(this.reverseEdges.get(vertex) ?? []);
  }

  /**
   * All edges as [source, target] pairs.
   */
  getEdges(): Array<[string, string]> {
    const result: Array<[string, string]> = [];
    for (const [source, targets] of this.edges) {
      for (const target of targets) {
        result.push([source, target]);
      }
    }
    return result;
  }

  /**
   * Strongly connected components in dependency order. Computed on first
   * access after a change.
   */
  get orderedSccs(): string[][] {
    if (this.sccs === null) {
      this.sccs = this.computeSccs();
    }
    return this.sccs;
  }

  private sorted(vertices: Iterable<string>): string[] {
    return [...vertices].sort((a, b) => compareKeys(this.sortKey(a), this.sortKey(b)));
  }

  private roots(): string[] {
    if (this.explicitRoot !== undefined) {
      return [this.explicitRoot];
    }
    return this.sorted([...this.vertices].filter(v => !this.reverseEdges.has(v)));
  }

  private computeSccs(): string[][] {
    const roots = this.roots();
    if (this.vertices.size > 0 && roots.length === 0) {
      throw new GraphError(`No roots found in graph with ${this.vertices.size} nodes`);
    }

    const result: string[][] = [];
    const index = new Map<string, number>();
    const lowLink = new Map<string, number>();
    const stack: string[] = [];
    const onStack = new Set<string>();
    let counter = 0;

    const follow = (vertex: string): void => {
      index.set(vertex, counter);
      lowLink.set(vertex, counter);
      counter++;
      stack.push(vertex);
      onStack.add(vertex);

      for (const target of this.sorted(this.edges.get(vertex) ?? [])) {
        if (!index.has(target)) {
          follow(target);
          lowLink.set(vertex, Math.min(lowLink.get(vertex) ?? 0, lowLink.get(target) ?? 0));
        } else if (onStack.has(target)) {
          lowLink.set(vertex, Math.min(lowLink.get(vertex) ?? 0, index.get(target) ?? 0));
        }
      }

      if (lowLink.get(vertex) === index.get(vertex)) {
        const scc: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) {
            break;
          }
          onStack.delete(member);
          scc.push(member);
        } while (member !== vertex);
        result.push(scc);
      }
    };

    for (const root of roots) {
      if (!index.has(root)) {
        follow(root);
      }
    }
    // Vertices only reachable through a cycle have no root above them.
    for (const vertex of this.sorted(this.vertices)) {
      if (!index.has(vertex)) {
        follow(vertex);
      }
    }
    return result;
  }
}
