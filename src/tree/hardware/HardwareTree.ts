/**
 * HardwareTree — the partial tree of a hardware description source.
 *
 * This module handles:
 * - Building HardwareNodes from the raw tree, parents first
 * - Labels, phandles, aliases and chosen nodes
 * - Bus-variant binding lookup and bindings inferred from raw values
 * - Default property types for nodes without a binding
 * - Hardware specific checks (status values, ranges, unit addresses)
 *
 * It does NOT handle:
 * - Parsing hardware source text (the caller supplies a RawHardwareTree)
 */

import { Binding } from '../../binding/Binding.js';
import { hardwareDialect } from '../../binding/dialects.js';
import { PropertyError, SourceError } from '../../errors.js';
import { HardwareTreeOptionsSchema, type HardwareTreeOptions, type ResolvedHardwareTreeOptions } from '../../config/options.js';
import { PartialTree } from '../PartialTree.js';
import { depthOf } from '../TreeNode.js';
import { hardwareConversions } from './conversions.js';
import { HardwareNode, STATUS_VALUES, type HardwareNodeContext } from './HardwareNode.js';
import { formatHardwareTree, formatRawValue, isCellRef, rawTypeOf, type Cell, type RawHardwareTree, type RawHardwareType, type RawHardwareValue } from './raw.js';
import type { BindingCatalog } from '../../binding/BindingCatalog.js';
import type { PropertySpec } from '../../binding/PropertySpec.js';
import type { DiagnosticSink } from '../../logging/diagnostics.js';

/**
 * Types of standard properties on nodes without a binding.
 */
const DEFAULT_PROP_TYPES: Record<string, string> = {
  compatible: 'string-array',
  status: 'string',
  ranges: 'compound',
  reg: 'array',
  'reg-names': 'string-array',
  label: 'string',
  interrupts: 'array',
  'interrupts-extended': 'compound',
  'interrupt-names': 'string-array',
  'interrupt-controller': 'boolean',
};

const INFERRED_TYPES: Partial<Record<RawHardwareType, string>> = {
  empty: 'boolean',
  bytes: 'uint8-array',
  num: 'int',
  nums: 'array',
  string: 'string',
  strings: 'string-array',
  phandle: 'phandle',
  phandles: 'phandles',
  'phandles-and-nums': 'phandle-array',
  path: 'path',
};

/**
 * Properties nodes may carry without declaring them.
 */
const EXEMPT_PROPS = new Set(['interrupt-parent', 'interrupts-extended', 'device_type', 'ranges']);

const NO_INCLUDES = { resolve: () => undefined };

let defaultBinding: Binding | undefined;

function defaultPropBinding(): Binding {
  if (defaultBinding === undefined) {
    const properties: Record<string, Record<string, unknown>> = {};
    for (const [name, type] of Object.entries(DEFAULT_PROP_TYPES)) {
      properties[name] = name === 'status' ? { type, required: false, enum: [...STATUS_VALUES] } : { type, required: false };
    }
    defaultBinding = Binding.fromDocument({ properties }, NO_INCLUDES, {
      path: '<built-in>',
      dialect: hardwareDialect,
      requireSchema: false,
      requireDescription: false,
    });
  }
  return defaultBinding;
}

export class HardwareTree extends PartialTree<RawHardwareValue, HardwareNode> implements HardwareNodeContext {
  readonly kind = 'hardware' as const;
  readonly schemaPropName = 'compatible';
  readonly enabledPropName = 'status';
  protected readonly dialect = hardwareDialect;
  protected readonly conversions = hardwareConversions;
  readonly options: ResolvedHardwareTreeOptions;

  private readonly labelToPath = new Map<string, string>();
  private readonly phandleToPath = new Map<number, string>();
  private aliasToPath?: Map<string, string>;

  constructor(
    private readonly rawTree: RawHardwareTree,
    catalog: BindingCatalog,
    options: HardwareTreeOptions = {},
    diagnostics?: DiagnosticSink,
  ) {
    super(rawTree.source ?? '<hardware>', catalog, options, diagnostics);
    this.options = HardwareTreeOptionsSchema.parse(options);
  }

  /**
   * The tree as hardware source text.
   */
  get source(): string {
    return formatHardwareTree(this.rawTree);
  }

  /**
   * Node at `path`, or at an alias (optionally followed by a sub-path).
   */
  override nodeByPath(path: string): HardwareNode | undefined {
    const node = super.nodeByPath(path);
    if (node !== undefined || path.startsWith('/')) {
      return node;
    }
    return this.findByAlias(path);
  }

  /**
   * Nodes named by the properties of /chosen. Properties that do not hold
   * a path are skipped.
   */
  get chosenNodes(): Map<string, HardwareNode> {
    const chosen = new Map<string, HardwareNode>();
    const node = this.nodeByPath('/chosen');
    for (const name of node?.rawPropertyNames ?? []) {
      const value = node?.rawValue(name);
      const target =
        value?.type === 'path'
          ? this.findReference(value.ref)
          : value?.type === 'strings' && value.strings.length === 1
            ? this.findPath(value.strings[0])
            : undefined;
      if (target !== undefined) {
        chosen.set(name, target);
      }
    }
    return chosen;
  }

  chosenNode(name: string): HardwareNode | undefined {
    return this.chosenNodes.get(name);
  }

  nodeAt(path: string): HardwareNode | undefined {
    return this.lookup(path);
  }

  nodeForCell(cell: Cell, from: HardwareNode, propName: string): HardwareNode | null {
    if (isCellRef(cell)) {
      return this.nodeForReference(cell.ref, from, propName);
    }
    const path = cell === 0 ? undefined : this.phandleToPath.get(cell);
    return path === undefined ? null : (this.lookup(path) ?? null);
  }

  nodeForReference(ref: string, from: HardwareNode, propName: string): HardwareNode {
    const node = this.findReference(ref);
    if (node === undefined) {
      throw new PropertyError(`'${propName}' references unknown node '${ref}'`, from.path);
    }
    return node;
  }

  nodeForPath(text: string, from: HardwareNode, propName: string): HardwareNode {
    const node = this.findPath(text);
    if (node === undefined) {
      throw new PropertyError(`'${propName}' names unknown path or alias '${text}'`, from.path);
    }
    return node;
  }

  aliasesOf(path: string): string[] {
    return [...this.aliases()].filter(([, target]) => target === path).map(([alias]) => alias);
  }

  protected collectSchemas(): Set<string> {
    const schemas = new Set<string>();
    for (const node of this.rawTree.nodes) {
      const value = node.properties?.compatible;
      if (value?.type === 'strings') {
        value.strings.forEach(schema => schemas.add(schema));
      }
    }
    return schemas;
  }

  protected createNodes(): HardwareNode[] {
    const ordered = [...this.rawTree.nodes].sort((a, b) => depthOf(a.path) - depthOf(b.path));
    return ordered.map(raw => {
      if (!raw.path.startsWith('/')) {
        throw new SourceError('node path must be absolute', raw.path);
      }
      const props = new Map(Object.entries(raw.properties ?? {}));
      const labels = raw.labels ?? [];
      for (const label of labels) {
        const existing = this.labelToPath.get(label);
        if (existing !== undefined && existing !== raw.path) {
          throw new SourceError(`label '${label}' appears on ${existing} and on ${raw.path}`);
        }
        this.labelToPath.set(label, raw.path);
      }
      const node = new HardwareNode(raw.path, props, labels, this);
      const phandle = node.optionalNumber('phandle');
      if (phandle !== undefined) {
        const existing = this.phandleToPath.get(phandle);
        if (existing !== undefined) {
          throw new SourceError(`phandle ${phandle} appears on ${existing} and on ${raw.path}`);
        }
        this.phandleToPath.set(phandle, raw.path);
      }
      return node;
    });
  }

  /**
   * Bus-specific variants first, then the variant-less binding.
   */
  protected override bindingForSchema(node: HardwareNode, schema: string): Binding | undefined {
    for (const bus of node.onBuses) {
      const binding = this.bindingFor(schema, bus);
      if (binding !== undefined) {
        return binding;
      }
    }
    return this.bindingFor(schema);
  }

  protected override inferredBinding(node: HardwareNode): Binding | undefined {
    if (!this.options.inferBindingForPaths.includes(node.path)) {
      return undefined;
    }
    if (node.schemas.length > 0) {
      throw new SourceError('compatible in node with inferred binding', node.path);
    }
    const properties: Record<string, { type: string }> = {};
    for (const name of node.rawPropertyNames) {
      const value = node.rawValue(name);
      const type = value === undefined ? undefined : INFERRED_TYPES[rawTypeOf(value)];
      if (value === undefined || type === undefined) {
        throw new SourceError(
          `cannot infer binding from property '${name}' with value ${value === undefined ? '?' : formatRawValue(value)}`,
          node.path,
        );
      }
      properties[name] = { type };
    }
    return Binding.fromDocument(
      { description: 'Inferred binding from properties', properties },
      NO_INCLUDES,
      { path: '<inferred>', dialect: hardwareDialect, requireSchema: false },
    );
  }

  protected override unboundSpecs(node: HardwareNode): PropertySpec[] {
    if (!this.options.defaultPropTypes) {
      return [];
    }
    const specs = defaultPropBinding().propertySpecs;
    return node.rawPropertyNames.flatMap(name => {
      const spec = specs.get(name);
      return spec === undefined ? [] : [spec];
    });
  }

  protected override isExempt(propName: string): boolean {
    return (
      super.isExempt(propName) ||
      propName.endsWith('-controller') ||
      propName.startsWith('#') ||
      EXEMPT_PROPS.has(propName)
    );
  }

  protected override initNode(node: HardwareNode): void {
    node.initAddresses();
  }

  protected override afterNodesBuilt(): void {
    if (!this.options.warnRegUnitAddressMismatch) {
      return;
    }
    for (const node of this.allNodes()) {
      const first = node.regs[0];
      if (first !== undefined && first.addr !== node.unitAddr && !node.isPciDevice) {
        this.diagnostics.report(
          'reg-unit-address-mismatch',
          `unit address and first address in 'reg' (0x${(first.addr ?? 0n).toString(16)}) don't match for ${node.path}`,
          { path: node.path },
        );
      }
    }
  }

  protected override initCrossRefs(node: HardwareNode): void {
    node.initCrossRefs();
  }

  protected override checkTree(): void {
    for (const node of this.allNodes()) {
      if (node.hasRaw('status')) {
        const status = node.stringOf('status');
        if (!STATUS_VALUES.includes(status)) {
          throw new SourceError(
            `unknown 'status' value "${status}" in ${this.sourcePath}, expected one of ${STATUS_VALUES.join(', ')}`,
            node.path,
          );
        }
      }
      const ranges = node.rawValue('ranges');
      if (ranges !== undefined && ranges.type !== 'empty' && !['num', 'nums'].includes(rawTypeOf(ranges))) {
        throw new SourceError(`expected 'ranges = < ... >;' in ${this.sourcePath}, not '${formatRawValue(ranges)}'`, node.path);
      }
    }
  }

  private findReference(ref: string): HardwareNode | undefined {
    if (ref.startsWith('&{') && ref.endsWith('}')) {
      return this.lookup(ref.slice(2, -1));
    }
    if (ref.startsWith('/')) {
      return this.lookup(ref);
    }
    const label = ref.startsWith('&') ? ref.slice(1) : ref;
    const path = this.labelToPath.get(label);
    return path === undefined ? undefined : this.lookup(path);
  }

  private findPath(text: string): HardwareNode | undefined {
    return text.startsWith('/') ? this.lookup(text) : this.findByAlias(text);
  }

  private findByAlias(text: string): HardwareNode | undefined {
    const slash = text.indexOf('/');
    const alias = slash < 0 ? text : text.slice(0, slash);
    const target = this.aliases().get(alias);
    if (target === undefined) {
      return undefined;
    }
    const rest = slash < 0 ? '' : text.slice(slash);
    return this.lookup(target === '/' ? rest || '/' : target + rest);
  }

  /**
   * Alias name -> target path, from the /aliases node.
   */
  private aliases(): Map<string, string> {
    if (this.aliasToPath === undefined) {
      const aliases = new Map<string, string>();
      const node = this.lookup('/aliases');
      for (const name of node?.rawPropertyNames ?? []) {
        const value = node?.rawValue(name);
        if (name === 'phandle' || value === undefined) {
          continue;
        }
        const target =
          value.type === 'path'
            ? this.findReference(value.ref)
            : value.type === 'strings' && value.strings.length === 1 && value.strings[0].startsWith('/')
              ? this.lookup(value.strings[0])
              : undefined;
        if (target === undefined) {
          throw new SourceError(`alias '${name}' does not name an existing node: ${formatRawValue(value)}`, '/aliases');
        }
        aliases.set(name, target.path);
      }
      this.aliasToPath = aliases;
    }
    return this.aliasToPath;
  }
}
