/**
 * HardwareNode — a node of the hardware description tree.
 *
 * Adds to the generic node what hardware sources carry beyond properties:
 * status, buses, registers and ranges, unit addresses, interrupts and pin
 * control states. Raw cell access helpers live here too, since address and
 * specifier decoding read raw values of this node and its relatives.
 */

import { PropertyError } from '../../errors.js';
import { matchesPattern } from '../../binding/pattern.js';
import { TreeNode } from '../TreeNode.js';
import { decodeRanges, decodeRegs, unitAddress, type AddressRange, type Register } from './address.js';
import { cellsToNumber } from './cells.js';
import { namedCells, nodeInterrupts } from './phandle.js';
import { formatRawValue, isCellRef, type Cell, type RawHardwareValue } from './raw.js';
import type { Binding } from '../../binding/Binding.js';
import type { ResolvedHardwareTreeOptions } from '../../config/options.js';
import type { ControllerAndData, NodeRef } from '../types.js';

/**
 * Accepted `status` values; `ok` reads as `okay`.
 */
export const STATUS_VALUES: readonly string[] = ['ok', 'okay', 'disabled', 'reserved', 'fail', 'fail-sss'];

const PINCTRL_PROP = /^pinctrl-[0-9]+/;

/**
 * One `pinctrl-<index>` state.
 */
export interface PinCtrl {
  /** Name from `pinctrl-names` */
  name: string | null;
  configNodes: NodeRef[];
}

/**
 * What a hardware node needs from its tree.
 */
export interface HardwareNodeContext {
  readonly sourcePath: string;
  readonly options: ResolvedHardwareTreeOptions;
  nodeAt(path: string): HardwareNode | undefined;
  /** Node a cell refers to; null for a zero or unknown numeric phandle */
  nodeForCell(cell: Cell, from: HardwareNode, propName: string): HardwareNode | null;
  /** Node named by a path, label or `&label` reference */
  nodeForReference(ref: string, from: HardwareNode, propName: string): HardwareNode;
  /** Node named by an absolute path or an alias */
  nodeForPath(text: string, from: HardwareNode, propName: string): HardwareNode;
  aliasesOf(path: string): string[];
}

function schemasFrom(path: string, raw: ReadonlyMap<string, RawHardwareValue>): string[] {
  const value = raw.get('compatible');
  if (value === undefined) {
    return [];
  }
  if (value.type !== 'strings') {
    throw new PropertyError(`expected 'compatible' to be a list of strings, not ${formatRawValue(value)}`, path);
  }
  return [...value.strings];
}

export class HardwareNode extends TreeNode<RawHardwareValue> {
  regs: Register[] = [];
  ranges: AddressRange[] = [];
  interrupts: ControllerAndData[] = [];
  pinctrls: PinCtrl[] = [];

  private readonly labelList: readonly string[];
  private cachedBusNode?: HardwareNode | null;

  constructor(
    path: string,
    raw: ReadonlyMap<string, RawHardwareValue>,
    labels: readonly string[],
    private readonly context: HardwareNodeContext,
  ) {
    super(path, raw, schemasFrom(path, raw));
    this.labelList = labels;
  }

  /** Source labels of the node */
  get labels(): readonly string[] {
    return this.labelList;
  }

  get parent(): HardwareNode | undefined {
    return this.parentPath === null ? undefined : this.context.nodeAt(this.parentPath);
  }

  /**
   * The `status` value, `okay` when absent or `ok`.
   */
  get status(): string {
    if (!this.hasRaw('status')) {
      return 'okay';
    }
    const status = this.stringOf('status');
    return status === 'ok' ? 'okay' : status;
  }

  get enabled(): boolean {
    return this.status === 'okay';
  }

  get readOnly(): boolean {
    return this.hasRaw('read-only');
  }

  /** Names under /aliases that point at this node */
  get aliases(): string[] {
    return this.context.aliasesOf(this.path);
  }

  /** The `label` property text, not the source labels */
  get label(): string | null {
    return this.hasRaw('label') ? this.stringOf('label') : null;
  }

  /**
   * Bus protocols this node provides, from its bindings' `bus:`.
   */
  get buses(): string[] {
    return [...new Set(this.bindings.flatMap(binding => binding.buses))];
  }

  /**
   * The nearest ancestor providing a bus, or null.
   */
  get busNode(): HardwareNode | null {
    if (this.cachedBusNode === undefined) {
      this.cachedBusNode = this.findBusNode();
    }
    return this.cachedBusNode;
  }

  get onBuses(): string[] {
    return this.busNode?.buses ?? [];
  }

  get isPciDevice(): boolean {
    return this.onBuses.includes('pcie');
  }

  get unitAddr(): bigint | null {
    return unitAddress(this);
  }

  /**
   * Specifier space -> cell names, first binding winning.
   */
  get specifierCells(): ReadonlyMap<string, readonly string[]> {
    const cells = new Map<string, readonly string[]>();
    for (const binding of [...this.bindings].reverse()) {
      for (const [space, names] of binding.specifierCells) {
        cells.set(space, names);
      }
    }
    return cells;
  }

  /**
   * The flash controller of a flash partition node.
   */
  get flashController(): HardwareNode {
    const controller = this.parent?.parent;
    if (controller === undefined) {
      throw new PropertyError('flash partition lacks parent or grandparent node', this.path);
    }
    if (controller.matchingSchemas.includes('soc-nv-flash')) {
      const parent = controller.parent;
      if (parent === undefined) {
        throw new PropertyError('flash controller cannot be the root node', controller.path);
      }
      return parent;
    }
    return controller;
  }

  /**
   * The SPI chip select from the bus node's `cs-gpios`, indexed by the
   * first register address.
   */
  get spiCsGpio(): ControllerAndData | null {
    const bus = this.busNode;
    const csGpios = bus?.properties.get('cs-gpios')?.typed;
    if (!this.onBuses.includes('spi') || csGpios === undefined || csGpios.kind !== 'indexed-reference-list') {
      return null;
    }
    const index = this.regs[0]?.addr;
    if (index === undefined || index === null) {
      throw new PropertyError("needs a 'reg' property, to look up the chip select index for SPI", this.path);
    }
    if (index >= BigInt(csGpios.value.length)) {
      throw new PropertyError(
        `index from 'regs' (${index}) is >= number of cs-gpios in ${bus?.path} (${csGpios.value.length})`,
        this.path,
      );
    }
    return csGpios.value[Number(index)];
  }

  /**
   * GPIOs hogged by a `gpio-hog` node, on its parent controller.
   */
  get gpioHogs(): ControllerAndData[] {
    if (!this.properties.has('gpio-hog')) {
      return [];
    }
    const controller = this.parent;
    if (controller === undefined || !controller.properties.has('gpio-controller')) {
      throw new PropertyError('GPIO hog lacks parent GPIO controller node', this.path);
    }
    const width = controller.optionalNumber('#gpio-cells');
    if (width === undefined) {
      throw new PropertyError('GPIO hog parent node lacks #gpio-cells', this.path);
    }
    const values = this.numbersOf('gpios');
    if (width === 0 || values.length % width !== 0) {
      throw new PropertyError(`'gpios' has ${values.length} cells, expected a multiple of <#gpio-cells> (= ${width})`, this.path);
    }
    const hogs: ControllerAndData[] = [];
    for (let i = 0; i < values.length; i += width) {
      hogs.push({
        controller: { path: controller.path },
        data: namedCells(this, controller, values.slice(i, i + width), 'gpio'),
        name: null,
        basename: 'gpio',
      });
    }
    return hogs;
  }

  /**
   * Cells of a cell-list property; an empty value has none.
   */
  cellsOf(name: string): readonly Cell[] {
    const value = this.requireRaw(name);
    if (value.type === 'empty') {
      return [];
    }
    if (value.type !== 'cells') {
      throw new PropertyError(`expected '${name}' to be a cell list, not ${formatRawValue(value)}`, this.path);
    }
    return value.cells;
  }

  /**
   * Cells of a cell-list property that holds numbers only.
   */
  numbersOf(name: string): number[] {
    return this.cellsOf(name).map(cell => {
      if (isCellRef(cell)) {
        throw new PropertyError(`expected '${name}' to hold numbers only, found reference ${cell.ref}`, this.path);
      }
      return cell;
    });
  }

  /**
   * A single-cell number, or undefined when the property is absent.
   */
  optionalNumber(name: string): number | undefined {
    if (!this.hasRaw(name)) {
      return undefined;
    }
    const values = this.numbersOf(name);
    if (values.length !== 1) {
      throw new PropertyError(`expected '${name}' to be a single cell, found ${values.length}`, this.path);
    }
    return values[0];
  }

  /** Multi-cell numbers combined big-endian */
  numberOf(name: string): number {
    return cellsToNumber(this.numbersOf(name));
  }

  stringsOf(name: string): string[] {
    const value = this.requireRaw(name);
    if (value.type !== 'strings') {
      throw new PropertyError(`expected '${name}' to be a string list, not ${formatRawValue(value)}`, this.path);
    }
    return [...value.strings];
  }

  stringOf(name: string): string {
    const values = this.stringsOf(name);
    if (values.length !== 1) {
      throw new PropertyError(`expected '${name}' to be a single string, found ${values.length}`, this.path);
    }
    return values[0];
  }

  resolveCell(cell: Cell, propName: string): HardwareNode | null {
    return this.context.nodeForCell(cell, this, propName);
  }

  /**
   * The node a single-reference property points at.
   */
  referencedNode(name: string): HardwareNode {
    const value = this.requireRaw(name);
    if (value.type === 'path') {
      return this.context.nodeForReference(value.ref, this, name);
    }
    if (value.type === 'strings') {
      return this.context.nodeForPath(this.stringOf(name), this, name);
    }
    const refCells = this.cellsOf(name);
    const target = refCells.length === 1 ? this.resolveCell(refCells[0], name) : null;
    if (target === null) {
      throw new PropertyError(`expected '${name}' to reference exactly one node, not ${formatRawValue(value)}`, this.path);
    }
    return target;
  }

  /**
   * Fill in element names from `<ident>-names`.
   */
  applyNames<E extends { name: string | null } | null>(ident: string, elements: E[]): E[] {
    const namesProp = `${ident}-names`;
    if (!this.hasRaw(namesProp)) {
      return elements;
    }
    const names = this.stringsOf(namesProp);
    if (names.length !== elements.length) {
      throw new PropertyError(
        `${namesProp} property has ${names.length} strings, expected ${elements.length} strings`,
        this.path,
      );
    }
    elements.forEach((element, i) => {
      if (element !== null) {
        element.name = names[i];
      }
    });
    return elements;
  }

  /** Decode `reg` and `ranges`; parents are decoded first */
  initAddresses(): void {
    this.regs = decodeRegs(this);
    this.ranges = decodeRanges(this);
  }

  /** Resolve interrupts and pin control states; needs every node built */
  initCrossRefs(): void {
    this.interrupts = nodeInterrupts(this);
    this.pinctrls = this.decodePinctrls();
  }

  /**
   * Interrupt controllers without a binding; with one, the controllers of
   * indexed reference lists matching its property patterns.
   */
  override sourceDependencies(binding?: Binding): string[] {
    if (binding === undefined) {
      return this.interrupts.map(interrupt => interrupt.controller.path);
    }
    const paths: string[] = [];
    for (const pattern of binding.propertySpecs.keys()) {
      for (const prop of this.properties.values()) {
        if (!matchesPattern(pattern, prop.name) || prop.typed.kind !== 'indexed-reference-list') {
          continue;
        }
        for (const element of prop.typed.value) {
          if (element !== null) {
            paths.push(element.controller.path);
          }
        }
      }
    }
    return paths;
  }

  override toString(): string {
    const paths = this.bindingPaths;
    const binding =
      paths.length === 0 ? 'no binding' : paths.length === 1 ? `binding ${paths[0]}` : `bindings ${paths.join(', ')}`;
    return `<HardwareNode ${this.path} in '${this.context.sourcePath}', ${binding}>`;
  }

  private requireRaw(name: string): RawHardwareValue {
    const value = this.rawValue(name);
    if (value === undefined) {
      throw new PropertyError(`missing '${name}' property`, this.path);
    }
    return value;
  }

  private findBusNode(): HardwareNode | null {
    const parent = this.parent;
    if (parent === undefined) {
      return null;
    }
    if (this.context.options.supportFixedPartitionsOnAnyBus && this.schemas.includes('fixed-partitions')) {
      return null;
    }
    if (parent.buses.length > 0) {
      return parent;
    }
    return parent.busNode;
  }

  private decodePinctrls(): PinCtrl[] {
    const names = this.rawPropertyNames.filter(name => PINCTRL_PROP.test(name)).sort();
    names.forEach((name, i) => {
      if (name !== `pinctrl-${i}`) {
        throw new PropertyError(
          `missing 'pinctrl-${i}' property - indices should be contiguous and start from zero`,
          this.path,
        );
      }
    });
    const states = names.map((name): PinCtrl => ({
      name: null,
      configNodes: this.cellsOf(name).map(cell => {
        const target = this.resolveCell(cell, name);
        if (target === null) {
          throw new PropertyError(`'${name}' references an unknown node`, this.path);
        }
        return { path: target.path };
      }),
    }));
    return this.applyNames('pinctrl', states);
  }
}
