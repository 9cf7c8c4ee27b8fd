/**
 * PartialTree — the typed, validated node tree built from one source.
 *
 * This module handles:
 * - Loading the bindings for the schemas the source uses
 * - Building nodes parent-before-child and matching them to bindings
 * - Resolving property values in a second pass, after all nodes exist
 * - Tree-wide checks and diagnostics
 *
 * Source kinds plug in through a conversion table and a few hooks; the
 * processing order is fixed here:
 * Unprocessed -> NodesBuilt -> CrossRefsResolved -> Checked.
 */

import { isDeepStrictEqual } from 'node:util';
import { parse as parseYaml } from 'yaml';
import { Binding } from '../binding/Binding.js';
import { isYamlMap } from '../binding/values.js';
import { PropertyError, SchemaError, SourceError, StateError } from '../errors.js';
import { DiagnosticSink } from '../logging/diagnostics.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { PartialTreeOptionsSchema, type PartialTreeOptions, type ResolvedPartialTreeOptions } from '../config/options.js';
import { Property } from './Property.js';
import { defaultValue, describeValue, matchesConst, type ConversionTable } from './conversions.js';
import { EMPTY_CONTEXT, type MergeContext, type SourceTree, type TreeState, type TypedValue } from './types.js';
import type { BindingCatalog } from '../binding/BindingCatalog.js';
import type { PropertySpec } from '../binding/PropertySpec.js';
import type { BindingDialect, SourceKind } from '../binding/types.js';
import type { TreeNode } from './TreeNode.js';

/**
 * Properties every source leaves undeclared.
 */
const ALWAYS_EXEMPT = new Set(['phandle']);

function bindingKey(schema: string, variant: string | null): string {
  return variant === null ? schema : `${schema}\u0000${variant}`;
}

export abstract class PartialTree<R, N extends TreeNode<R>> implements SourceTree {
  abstract readonly kind: SourceKind;
  /** Raw property carrying the schema identifiers */
  abstract readonly schemaPropName: string;
  /** Raw property carrying the enabled marker */
  abstract readonly enabledPropName: string;
  protected abstract readonly dialect: BindingDialect;
  protected abstract readonly conversions: ConversionTable<R, N>;

  readonly diagnostics: DiagnosticSink;
  protected readonly logger: Logger;
  protected context: MergeContext = EMPTY_CONTEXT;

  private currentState: TreeState = 'unprocessed';
  private readonly bindingTable = new Map<string, Binding>();
  private readonly nodeList: N[] = [];
  private readonly byPath = new Map<string, N>();
  private readonly baseOptions: ResolvedPartialTreeOptions;

  constructor(
    readonly sourcePath: string,
    protected readonly catalog: BindingCatalog,
    options: PartialTreeOptions = {},
    diagnostics?: DiagnosticSink,
  ) {
    this.baseOptions = PartialTreeOptionsSchema.parse(options);
    this.logger = createLogger('partial-tree').child({ source: sourcePath });
    this.diagnostics = diagnostics ?? new DiagnosticSink(this.logger);
  }

  get state(): TreeState {
    return this.currentState;
  }

  /**
   * All nodes, parent before child.
   */
  get nodes(): readonly N[] {
    this.requireChecked('nodes');
    return this.nodeList;
  }

  nodeByPath(path: string): N | undefined {
    this.requireChecked('nodeByPath');
    return this.byPath.get(path);
  }

  /**
   * Registered bindings, including child bindings that carry a schema.
   */
  get bindings(): Binding[] {
    this.requireChecked('bindings');
    return [...this.bindingTable.values()];
  }

  bindingFor(schema: string, variant: string | null = null): Binding | undefined {
    return this.bindingTable.get(bindingKey(schema, variant));
  }

  /**
   * Build, resolve and check every node. Sources that this one references
   * must already be merged into `context`.
   */
  process(context: MergeContext = EMPTY_CONTEXT): void {
    if (this.currentState !== 'unprocessed') {
      throw new StateError(`${this.toString()} has already been processed`);
    }
    this.context = context;

    this.registerBindings();
    for (const node of this.createNodes()) {
      if (this.byPath.has(node.path)) {
        throw new SourceError('node appears twice in the source', node.path);
      }
      if (node.parentPath !== null && !this.byPath.has(node.parentPath)) {
        throw new SourceError(`parent '${node.parentPath}' is missing or comes after its child`, node.path);
      }
      this.nodeList.push(node);
      this.byPath.set(node.path, node);
      if (node.parentPath !== null) {
        this.byPath.get(node.parentPath)?.childPaths.push(node.path);
      }
    }

    for (const node of this.nodeList) {
      this.bindNode(node);
      this.checkUndeclared(node);
      this.initNode(node);
    }
    this.afterNodesBuilt();
    this.currentState = 'nodes-built';

    for (const node of this.nodeList) {
      this.initProperties(node);
      this.initCrossRefs(node);
    }
    this.currentState = 'cross-refs-resolved';

    this.check();
    this.currentState = 'checked';
    this.logger.debug({ nodes: this.nodeList.length, bindings: this.bindingTable.size }, 'partial tree processed');
  }

  toString(): string {
    return `<${this.constructor.name} for '${this.sourcePath}'>`;
  }

  /** Schema identifiers used anywhere in the source */
  protected abstract collectSchemas(): Set<string>;

  /** Node objects for every raw node, parent before child */
  protected abstract createNodes(): N[];

  /**
   * Node lookup usable while processing.
   */
  protected lookup(path: string): N | undefined {
    return this.byPath.get(path);
  }

  protected allNodes(): readonly N[] {
    return this.nodeList;
  }

  protected bindingForSchema(_node: N, schema: string): Binding | undefined {
    return this.bindingFor(schema);
  }

  /** A binding built from the node's own values, for sources that support it */
  protected inferredBinding(_node: N): Binding | undefined {
    return undefined;
  }

  /** Specs for nodes without any matched binding */
  protected unboundSpecs(_node: N): PropertySpec[] {
    return [];
  }

  protected isExempt(propName: string): boolean {
    return propName === this.schemaPropName || propName === this.enabledPropName || ALWAYS_EXEMPT.has(propName);
  }

  /** Runs once per node after its bindings are matched */
  protected initNode(_node: N): void {}

  protected afterNodesBuilt(): void {}

  /** Runs once per node after its properties are resolved */
  protected initCrossRefs(_node: N): void {}

  protected checkTree(): void {}

  /**
   * Match explicit schemas in source order, then child bindings of the
   * parent's bindings.
   */
  protected bindNode(node: N): void {
    const bindings: Binding[] = [];
    const matching: string[] = [];

    const inferred = this.inferredBinding(node);
    if (inferred !== undefined) {
      bindings.push(inferred);
    }

    for (const schema of node.schemas) {
      const binding = this.bindingForSchema(node, schema);
      if (binding !== undefined) {
        bindings.push(binding);
        matching.push(schema);
      }
    }

    const parent = node.parentPath === null ? undefined : this.byPath.get(node.parentPath);
    for (const parentBinding of parent?.bindings ?? []) {
      for (const child of parentBinding.childBindingsFor(node.name)) {
        bindings.push(child);
        if (child.schema !== null) {
          matching.push(child.schema);
        }
      }
    }

    node.attachBindings(bindings, matching);
  }

  private registerBindings(): void {
    const schemas = this.collectSchemas();
    if (schemas.size === 0) {
      return;
    }
    for (const file of this.catalog.candidates(schemas)) {
      let doc: unknown;
      try {
        doc = parseYaml(file.source);
      } catch (err) {
        throw new SchemaError(
          `appears in binding directories but isn't valid YAML: ${err instanceof Error ? err.message : String(err)}`,
          file.path,
        );
      }
      if (!isYamlMap(doc)) {
        continue;
      }
      const schema = doc[this.dialect.schemaKey(doc)];
      if (typeof schema !== 'string' || !schemas.has(schema)) {
        continue;
      }
      this.register(Binding.fromDocument(doc, this.catalog, { path: file.path, dialect: this.dialect }));
    }
    this.logger.debug({ bindings: this.bindingTable.size }, 'bindings registered');
  }

  private register(binding: Binding): void {
    if (binding.schema === null) {
      return;
    }
    const key = bindingKey(binding.schema, binding.variant);
    const existing = this.bindingTable.get(key);
    if (existing !== undefined) {
      let message = `both ${existing.path} and ${binding.path} have schema '${binding.schema}'`;
      if (binding.variant !== null) {
        message += ` and 'binding variant ${binding.variant}'`;
      }
      throw new SchemaError(message);
    }
    this.bindingTable.set(key, binding);
    for (const children of binding.childBindings.values()) {
      for (const child of children) {
        this.register(child);
      }
    }
  }

  private checkUndeclared(node: N): void {
    if (node.specs.size === 0) {
      return;
    }
    for (const name of node.rawPropertyNames) {
      if (this.isExempt(name) || node.specs.has(name)) {
        continue;
      }
      const paths = node.bindingPaths;
      if (paths.length === 0) {
        throw new PropertyError(`'${name}' in ${this.sourcePath} has no corresponding binding`, node.path);
      }
      throw new PropertyError(
        `'${name}' in ${this.sourcePath} is not declared in 'properties:' in ${paths.join(', ')}`,
        node.path,
      );
    }
  }

  private initProperties(node: N): void {
    const specs = node.specs.size > 0 ? [...node.specs.values()] : this.unboundSpecs(node);
    for (const spec of specs) {
      const typed = this.resolveValue(node, spec);
      if (typed === undefined) {
        continue;
      }
      this.checkConstraints(node, spec, typed);

      // '#...-cells' and '...-map' properties are only read through their users.
      if (spec.name.startsWith('#') || spec.name.endsWith('-map')) {
        continue;
      }
      node.setProperty(new Property(spec, node.path, typed));
    }
  }

  private resolveValue(node: N, spec: PropertySpec): TypedValue | undefined {
    const raw = node.rawValue(spec.name);
    if (raw === undefined || raw === null) {
      if (spec.required && node.enabled) {
        throw new PropertyError(
          `'${spec.name}' is marked as required in 'properties:' in ${spec.path}, ` +
            `but does not appear in ${this.sourcePath}`,
          node.path,
        );
      }
      return defaultValue(spec) ?? (spec.kind === 'boolean' ? { kind: 'boolean', value: false } : undefined);
    }

    if (spec.deprecated) {
      this.diagnostics.report(
        'deprecated-property',
        `'${spec.name}' is marked as deprecated in 'properties:' in ${spec.path} for node ${node.path}`,
        { path: node.path, asError: this.baseOptions.errOnDeprecated },
      );
    }
    const kind = spec.kind;
    if (kind === 'child-node') {
      return undefined;
    }
    return this.conversions[kind](raw, spec, node);
  }

  private checkConstraints(node: N, spec: PropertySpec, typed: TypedValue): void {
    const allowed = spec.enum;
    if (allowed !== undefined && allowed.length > 0) {
      const subValues: readonly unknown[] = Array.isArray(typed.value) ? typed.value : [typed.value];
      for (const sub of subValues) {
        if (!allowed.some(candidate => isDeepStrictEqual(candidate, sub))) {
          throw new PropertyError(
            `value of property '${spec.name}' (${describeValue(sub)}) is not in 'enum' list in ` +
              `${spec.path} (${allowed.map(describeValue).join(', ')})`,
            node.path,
          );
        }
      }
    }
    if (spec.hasConst && !matchesConst(typed.value, spec.const)) {
      throw new PropertyError(
        `value of property '${spec.name}' (${describeValue(typed.value)}) is different from the 'const' value ` +
          `specified in ${spec.path} (${describeValue(spec.const)})`,
        node.path,
      );
    }
  }

  private check(): void {
    for (const binding of this.bindingTable.values()) {
      for (const spec of binding.propertySpecs.values()) {
        if (spec.enum === undefined || spec.enum.length === 0 || spec.type !== 'string') {
          continue;
        }
        const values = spec.enum.map(describeValue).join(', ');
        if (!spec.enumTokenizable) {
          this.diagnostics.report(
            'enum-not-tokenizable',
            `schema '${binding.schema}' in binding '${binding.path}' has non-tokenizable enum ` +
              `for property '${spec.name}': ${values}`,
          );
        } else if (!spec.enumUpperTokenizable) {
          this.diagnostics.report(
            'enum-lowercase-only',
            `schema '${binding.schema}' in binding '${binding.path}' has enum for property ` +
              `'${spec.name}' that is only tokenizable in lowercase: ${values}`,
          );
        }
      }
    }
    this.checkTree();
  }

  private requireChecked(accessor: string): void {
    if (this.currentState !== 'checked') {
      throw new StateError(`${accessor} is not available before ${this.toString()} is processed`);
    }
  }
}
