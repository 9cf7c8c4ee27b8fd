/**
 * ConfigTree — the partial tree of a software configuration source.
 *
 * This module handles:
 * - Merging configuration overlays into one document
 * - Building ConfigNodes: map entries are child nodes, all others properties
 * - Resolving pointers against this tree and the merged tree built so far
 * - Re-serializing the merged configuration
 *
 * It does NOT handle:
 * - Checking label uniqueness across sources (that's the SettingsTree's job)
 */

import { readFile } from 'node:fs/promises';
import { stringify as stringifyYaml } from 'yaml';
import { softwareDialect } from '../../binding/dialects.js';
import { isStringList, isYamlMap } from '../../binding/values.js';
import { PropertyError, SourceError } from '../../errors.js';
import { PartialTree } from '../PartialTree.js';
import { configConversions } from './conversions.js';
import { ConfigNode, type ConfigNodeContext } from './ConfigNode.js';
import { applyOverlays, parseOverlays } from './overlays.js';
import type { BindingCatalog } from '../../binding/BindingCatalog.js';
import type { YamlMap } from '../../binding/types.js';
import type { PartialTreeOptions } from '../../config/options.js';
import type { DiagnosticSink } from '../../logging/diagnostics.js';

/**
 * Overlays of a configuration source and where they came from.
 */
export interface ConfigSource {
  /** Used in messages (default: '<config>') */
  source?: string;
  overlays: readonly unknown[];
}

function childPath(parent: string, name: string): string {
  return parent === '/' ? `/${name}` : `${parent}/${name}`;
}

/**
 * Every node map of the document with its path, parents first.
 */
function* documentNodes(node: YamlMap, path = '/'): Generator<[string, YamlMap]> {
  yield [path, node];
  for (const [name, value] of Object.entries(node)) {
    if (isYamlMap(value)) {
      yield* documentNodes(value, childPath(path, name));
    }
  }
}

export class ConfigTree extends PartialTree<unknown, ConfigNode> implements ConfigNodeContext {
  readonly kind = 'software' as const;
  readonly schemaPropName = 'schema';
  readonly enabledPropName = 'enabled';
  protected readonly dialect = softwareDialect;
  protected readonly conversions = configConversions;

  private readonly document: YamlMap;
  private readonly pathsByName = new Map<string, string[]>();

  constructor(config: ConfigSource, catalog: BindingCatalog, options: PartialTreeOptions = {}, diagnostics?: DiagnosticSink) {
    super(config.source ?? '<config>', catalog, options, diagnostics);
    this.document = applyOverlays(config.overlays);
  }

  /**
   * Build a tree from configuration text.
   */
  static parse(
    text: string,
    sourcePath: string,
    catalog: BindingCatalog,
    options: PartialTreeOptions = {},
    diagnostics?: DiagnosticSink,
  ): ConfigTree {
    return new ConfigTree({ source: sourcePath, overlays: parseOverlays(text, sourcePath) }, catalog, options, diagnostics);
  }

  /**
   * Build a tree from configuration files. Overlays of later files apply
   * after those of earlier ones.
   */
  static async fromFiles(
    paths: readonly string[],
    catalog: BindingCatalog,
    options: PartialTreeOptions = {},
    diagnostics?: DiagnosticSink,
  ): Promise<ConfigTree> {
    const overlays: unknown[] = [];
    for (const path of paths) {
      overlays.push(...parseOverlays(await readFile(path, 'utf-8'), path));
    }
    return new ConfigTree({ source: paths.join(', '), overlays }, catalog, options, diagnostics);
  }

  /**
   * The merged configuration as YAML.
   */
  get configSource(): string {
    return stringifyYaml(this.document);
  }

  /**
   * Resolve a pointer: paths of this tree, then unique node names of this
   * tree, then labels and paths of the merged tree built so far.
   */
  resolvePointer(pointer: string, from: ConfigNode, propName: string): string {
    const key = pointer.startsWith('&') ? pointer.slice(1) : pointer;
    if (this.lookup(key) !== undefined) {
      return key;
    }
    const named = this.pathsByName.get(key);
    if (named !== undefined && named.length > 1) {
      throw new PropertyError(`pointer '${pointer}' in '${propName}' is ambiguous: ${named.join(', ')}`, from.path);
    }
    const path = named?.[0] ?? this.context.pathForLabel(key) ?? (this.context.hasPath(key) ? key : undefined);
    if (path === undefined) {
      throw new PropertyError(`could not resolve pointer '${pointer}' in '${propName}' to a node`, from.path);
    }
    return path;
  }

  protected collectSchemas(): Set<string> {
    const schemas = new Set<string>();
    for (const [, node] of documentNodes(this.document)) {
      const schema = node.schema;
      if (typeof schema === 'string') {
        schemas.add(schema);
      } else if (isStringList(schema)) {
        schema.forEach(s => schemas.add(s));
      }
    }
    return schemas;
  }

  protected createNodes(): ConfigNode[] {
    const nodes: ConfigNode[] = [];
    for (const [path, yamlNode] of documentNodes(this.document)) {
      const props = new Map<string, unknown>();
      for (const [name, value] of Object.entries(yamlNode)) {
        if (isYamlMap(value)) {
          if (name.includes('/')) {
            throw new SourceError(`node name '${name}' must not contain '/'`, path);
          }
        } else {
          props.set(name, value);
        }
      }
      const node = new ConfigNode(path, props, this);
      if (node.parentPath !== null) {
        this.pathsByName.set(node.name, [...(this.pathsByName.get(node.name) ?? []), path]);
      }
      nodes.push(node);
    }
    return nodes;
  }
}
