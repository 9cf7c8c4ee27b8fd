/**
 * Types shared by the partial trees of both source kinds.
 *
 * Property values form a tagged union over the value kinds of the binding
 * type table. References to other nodes are always held as paths, never as
 * node objects; lookups go through the owning tree.
 */

import type { Binding } from '../binding/Binding.js';
import type { SourceKind } from '../binding/types.js';
import type { Property } from './Property.js';

/**
 * A reference to another node, by path.
 */
export interface NodeRef {
  path: string;
}

/**
 * One element of an indexed reference list, or of a node's interrupts.
 */
export interface ControllerAndData {
  /** The controller after mapping through any `<space>-map` */
  controller: NodeRef;
  /** Cell name -> cell value, named by the controller's `<space>-cells` */
  data: Record<string, number>;
  /** Element name from the node's `<space>-names`, if any */
  name: string | null;
  /** Specifier space of the element, null for interrupts */
  basename: string | null;
}

/**
 * Value type per value kind.
 */
export interface ValueTypes {
  boolean: boolean;
  integer: number;
  'integer-array': number[];
  'byte-array': Uint8Array;
  string: string;
  'string-array': string[];
  float: number;
  'float-array': number[];
  'node-reference': NodeRef;
  'node-reference-list': NodeRef[];
  'indexed-reference-list': Array<ControllerAndData | null>;
  path: NodeRef;
}

export type ValueKindWithValue = keyof ValueTypes;

/**
 * A resolved property value tagged with its kind.
 */
export type TypedValue = { [K in ValueKindWithValue]: { kind: K; value: ValueTypes[K] } }[ValueKindWithValue];

/**
 * Processing states of a partial tree.
 */
export type TreeState = 'unprocessed' | 'nodes-built' | 'cross-refs-resolved' | 'checked';

/**
 * Lookups into the merged tree built from previously processed sources.
 */
export interface MergeContext {
  /** Path of the entity carrying `label` as a unique label */
  pathForLabel(label: string): string | undefined;
  hasPath(path: string): boolean;
}

/**
 * Context for a tree processed on its own.
 */
export const EMPTY_CONTEXT: MergeContext = {
  pathForLabel: () => undefined,
  hasPath: () => false,
};

/**
 * What the merge and the dependency graph need from a node of any source.
 */
export interface SourceNode {
  readonly path: string;
  readonly name: string;
  /** Null for the root */
  readonly parentPath: string | null;
  readonly childPaths: readonly string[];
  /** Schema identifiers in source order */
  readonly schemas: readonly string[];
  /** Label candidates; only labels unique across the merged tree become public */
  readonly labels: readonly string[];
  readonly enabled: boolean;
  readonly properties: ReadonlyMap<string, Property>;
  /** Matched bindings, most specific first */
  readonly bindings: readonly Binding[];
  readonly matchingSchemas: readonly string[];
  readonly bindingPaths: readonly string[];
  /**
   * Paths this node requires beyond its generic references. With a binding,
   * only properties matching that binding's patterns are considered;
   * without one, node-level dependencies are returned.
   */
  sourceDependencies(binding?: Binding): string[];
}

/**
 * What the merged tree needs from a partial tree.
 */
export interface SourceTree {
  readonly kind: SourceKind;
  /** Where the tree was read from, for messages */
  readonly sourcePath: string;
  readonly state: TreeState;
  /** Build and check all nodes. Allowed once. */
  process(context?: MergeContext): void;
  /** Nodes in parent-before-child order */
  readonly nodes: readonly SourceNode[];
}
