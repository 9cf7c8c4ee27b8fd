/**
 * SettingsTree — the merged tree of all sources.
 *
 * This module handles:
 * - Processing sources in addition order, each against the entities merged
 *   so far
 * - Merging same-path nodes into MergedEntities
 * - Public labels (only labels unique across the merged tree)
 * - Dependency ordinals from the ordered SCCs of the dependency graph
 * - Lookup tables by path, label, ordinal and schema, and vendor names
 *
 * Processing is one-shot:
 * Initial -> HasSources -> HasNodes -> HasOrdinals -> Processed.
 */

import { GraphError, PropertyError, StateError } from '../errors.js';
import { DependencyGraph } from '../graph/DependencyGraph.js';
import { DiagnosticSink } from '../logging/diagnostics.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { SettingsTreeOptionsSchema, type ResolvedSettingsTreeOptions, type SettingsTreeOptions } from '../config/options.js';
import { MergedEntity, type EntityRegistry } from './MergedEntity.js';
import type { SourceKind } from '../binding/types.js';
import type { MergeContext, SourceTree } from '../tree/types.js';

export type SettingsTreeState = 'initial' | 'has-sources' | 'has-nodes' | 'has-ordinals' | 'processed';

const STATES: readonly SettingsTreeState[] = ['initial', 'has-sources', 'has-nodes', 'has-ordinals', 'processed'];

/**
 * Schema identifiers must match this.
 */
export const SCHEMA_PATTERN = /^[a-zA-Z][a-zA-Z0-9,+\-._]+$/;

export class SettingsTree implements MergeContext, EntityRegistry {
  readonly diagnostics: DiagnosticSink;
  private readonly options: ResolvedSettingsTreeOptions;
  private readonly logger: Logger;

  private currentState: SettingsTreeState = 'initial';
  private readonly sourceList: SourceTree[] = [];
  private readonly entityList: MergedEntity[] = [];
  private readonly byPath = new Map<string, MergedEntity>();
  private labelTable = new Map<string, MergedEntity>();
  private readonly graph = new DependencyGraph();

  private readonly ordinalTable = new Map<number, MergedEntity>();
  private readonly enabledBySchema = new Map<string, MergedEntity[]>();
  private readonly disabledBySchema = new Map<string, MergedEntity[]>();
  private readonly bySchema = new Map<string, MergedEntity[]>();
  private readonly vendorBySchema = new Map<string, string>();
  private readonly modelBySchema = new Map<string, string>();

  constructor(options: SettingsTreeOptions = {}, diagnostics?: DiagnosticSink) {
    this.options = SettingsTreeOptionsSchema.parse(options);
    this.logger = createLogger('settings-tree');
    this.diagnostics = diagnostics ?? new DiagnosticSink(this.logger);
  }

  get state(): SettingsTreeState {
    return this.currentState;
  }

  /**
   * Add an unprocessed source. Sources referencing nodes of other sources
   * must be added after them.
   */
  addSource(tree: SourceTree): this {
    this.requireState('addSource', 'initial', 'has-sources');
    if (tree.state !== 'unprocessed') {
      throw new StateError(`${String(tree)} has already been processed`);
    }
    if (this.sourceList.some(source => source.kind === tree.kind)) {
      throw new StateError(`a ${tree.kind} source has already been added`);
    }
    this.sourceList.push(tree);
    this.currentState = 'has-sources';
    return this;
  }

  /**
   * Process every source, merge their nodes, assign ordinals and build the
   * lookup tables.
   */
  process(): this {
    this.requireState('process', 'has-sources');

    const labelOwners = new Map<string, Set<MergedEntity>>();
    for (const tree of this.sourceList) {
      tree.process(this);
      for (const node of tree.nodes) {
        let entity = this.byPath.get(node.path);
        if (entity === undefined) {
          entity = new MergedEntity(node.path, this);
          this.entityList.push(entity);
          this.byPath.set(node.path, entity);
        }
        entity.addNode(node, tree);
        for (const label of node.labels) {
          labelOwners.set(label, (labelOwners.get(label) ?? new Set()).add(entity));
        }
      }
      this.labelTable = new Map(
        [...labelOwners].flatMap(([label, owners]): Array<[string, MergedEntity]> =>
          owners.size === 1 ? [[label, [...owners][0]]] : [],
        ),
      );
      this.logger.debug({ source: tree.sourcePath, entities: this.entityList.length }, 'source merged');
    }
    this.currentState = 'has-nodes';

    this.initOrdinals();
    this.currentState = 'has-ordinals';

    this.initLookupTables();
    this.currentState = 'processed';
    return this;
  }

  /** Sources in addition order */
  get sources(): readonly SourceTree[] {
    return this.sourceList;
  }

  sourceOf(kind: SourceKind): SourceTree | undefined {
    return this.sourceList.find(source => source.kind === kind);
  }

  /** Entities in merge order: sources in addition order, parents first */
  get entities(): readonly MergedEntity[] {
    this.requireState('entities', 'processed');
    return this.entityList;
  }

  entityByPath(path: string): MergedEntity | undefined {
    this.requireState('entityByPath', 'has-nodes', 'processed');
    return this.byPath.get(path);
  }

  get labels(): ReadonlyMap<string, MergedEntity> {
    this.requireState('labels', 'has-nodes', 'processed');
    return this.labelTable;
  }

  entityByLabel(label: string): MergedEntity | undefined {
    return this.labels.get(label);
  }

  /** Ordinal -> entity */
  get ordinals(): ReadonlyMap<number, MergedEntity> {
    this.requireState('ordinals', 'processed');
    return this.ordinalTable;
  }

  entityByOrdinal(ordinal: number): MergedEntity | undefined {
    return this.ordinals.get(ordinal);
  }

  /** Schema identifiers used by any entity */
  get schemas(): Set<string> {
    this.requireState('schemas', 'processed');
    return new Set(this.bySchema.keys());
  }

  /** Entities declaring `schema`, enabled ones first */
  entitiesForSchema(schema: string): MergedEntity[] {
    this.requireState('entitiesForSchema', 'processed');
    return this.bySchema.get(schema) ?? [];
  }

  enabledForSchema(schema: string): MergedEntity[] {
    this.requireState('enabledForSchema', 'processed');
    return this.enabledBySchema.get(schema) ?? [];
  }

  disabledForSchema(schema: string): MergedEntity[] {
    this.requireState('disabledForSchema', 'processed');
    return this.disabledBySchema.get(schema) ?? [];
  }

  /** Vendor name of a `vendor,model` schema with a known prefix */
  vendorOf(schema: string): string | undefined {
    this.requireState('vendorOf', 'processed');
    return this.vendorBySchema.get(schema);
  }

  modelOf(schema: string): string | undefined {
    this.requireState('modelOf', 'processed');
    return this.modelBySchema.get(schema);
  }

  /** Strongly connected components in dependency order */
  get orderedSccs(): MergedEntity[][] {
    this.requireState('orderedSccs', 'processed');
    return this.graph.orderedSccs.map(scc => scc.flatMap(path => this.byPath.get(path) ?? []));
  }

  pathForLabel(label: string): string | undefined {
    return this.labelTable.get(label)?.path;
  }

  hasPath(path: string): boolean {
    return this.byPath.has(path);
  }

  dependenciesOf(path: string): string[] {
    return this.graph.dependsOn(path);
  }

  dependentsOf(path: string): string[] {
    return this.graph.requiredBy(path);
  }

  toString(): string {
    return `<SettingsTree ${this.sourceList.map(source => source.sourcePath).join(', ')}>`;
  }

  private initOrdinals(): void {
    for (const entity of this.entityList) {
      entity.addToGraph(this.graph);
    }
    const sccs = this.graph.orderedSccs;
    const loop = sccs.find(scc => scc.length > 1);
    if (loop !== undefined) {
      throw new GraphError(`Dependency loop detected: ${loop.join(', ')}`, loop);
    }
    sccs.forEach(([path], ordinal) => {
      const entity = path === undefined ? undefined : this.byPath.get(path);
      if (entity !== undefined) {
        entity.assignOrdinal(ordinal);
        this.ordinalTable.set(ordinal, entity);
      }
    });
    this.logger.debug({ ordinals: this.ordinalTable.size }, 'ordinals assigned');
  }

  private initLookupTables(): void {
    const prefixes = this.options.vendorPrefixes;
    for (const entity of this.entityList) {
      for (const schema of entity.schemas) {
        const table = entity.enabled ? this.enabledBySchema : this.disabledBySchema;
        table.set(schema, [...(table.get(schema) ?? []), entity]);

        if (this.vendorBySchema.has(schema)) {
          continue;
        }
        if (!SCHEMA_PATTERN.test(schema)) {
          throw new PropertyError(
            `schema '${schema}' must match this regular expression: '${SCHEMA_PATTERN.source}'`,
            entity.path,
          );
        }
        const comma = schema.indexOf(',');
        if (comma < 0 || prefixes === undefined || prefixes.size === 0) {
          continue;
        }
        const vendor = schema.slice(0, comma);
        const name = prefixes.get(vendor);
        if (name !== undefined) {
          this.vendorBySchema.set(schema, name);
          this.modelBySchema.set(schema, schema.slice(comma + 1));
        } else if (entity.path !== '/') {
          this.diagnostics.report('unknown-vendor', `schema '${schema}' has unknown vendor prefix '${vendor}'`, {
            path: entity.path,
            asError: this.options.errOnMissingVendor,
          });
        }
      }
    }

    for (const table of [this.enabledBySchema, this.disabledBySchema]) {
      for (const [schema, entities] of table) {
        this.bySchema.set(schema, [...(this.bySchema.get(schema) ?? []), ...entities]);
      }
    }
  }

  private requireState(operation: string, min: SettingsTreeState, max: SettingsTreeState = min): void {
    const index = STATES.indexOf(this.currentState);
    if (index < STATES.indexOf(min) || index > STATES.indexOf(max)) {
      const expected = STATES.slice(STATES.indexOf(min), STATES.indexOf(max) + 1).join(' or ');
      throw new StateError(`${operation}: tree should be in state '${expected}' but is in state '${this.currentState}'`);
    }
  }
}
