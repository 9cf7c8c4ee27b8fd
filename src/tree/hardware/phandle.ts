/**
 * Specifier lists and nexus maps.
 *
 * This module handles:
 * - Walking `<phandle> <cells...>` lists, where each controller sets the
 *   width of its own cells through `#<space>-cells`
 * - Mapping specifiers through `<space>-map`, `<space>-map-mask` and
 *   `<space>-map-pass-thru`, recursively
 * - Naming specifier cells from the controller's binding
 * - Interrupts, from `interrupts-extended` or `interrupts`
 */

import { PropertyError } from '../../errors.js';
import { addressCells } from './address.js';
import { andCells, notCells, orCells, sameCells, sliceCells } from './cells.js';
import { isCellRef } from './raw.js';
import type { ControllerAndData } from '../types.js';
import type { HardwareNode } from './HardwareNode.js';

/**
 * A controller and the raw specifier cells addressed to it.
 */
export interface Specifier {
  controller: HardwareNode;
  data: number[];
}

/**
 * Specifier space of a phandle-array property: the declared one, `gpio`
 * for `*gpios`, else the name without its trailing `s`.
 */
export function specifierSpaceFor(propName: string, declared?: string): string {
  if (declared !== undefined && declared !== '') {
    return declared;
  }
  return propName.endsWith('gpios') ? 'gpio' : propName.slice(0, -1);
}

function specifierCells(controller: HardwareNode, space: string, referrer: HardwareNode): number {
  const count = controller.optionalNumber(`#${space}-cells`);
  if (count === undefined) {
    throw new PropertyError(`${controller.path} lacks #${space}-cells (referenced by ${referrer.path})`);
  }
  return count;
}

/**
 * Split a `<phandle> <cells...>` list. A zero or unknown numeric phandle
 * yields a null element and consumes no cells.
 */
export function phandleValueList(node: HardwareNode, propName: string, space: string): Array<Specifier | null> {
  const cells = node.cellsOf(propName);
  const result: Array<Specifier | null> = [];
  let i = 0;
  while (i < cells.length) {
    const controller = node.resolveCell(cells[i], propName);
    i += 1;
    if (controller === null) {
      result.push(null);
      continue;
    }
    const width = specifierCells(controller, space, node);
    if (cells.length - i < width) {
      throw new PropertyError(`missing data after phandle in '${propName}'`, node.path);
    }
    const data: number[] = [];
    for (const cell of cells.slice(i, i + width)) {
      if (isCellRef(cell)) {
        throw new PropertyError(`unexpected reference ${cell.ref} in the specifier cells of '${propName}'`, node.path);
      }
      data.push(cell);
    }
    i += width;
    result.push({ controller, data });
  }
  return result;
}

function maskSpecifier(prefix: string, child: HardwareNode, parent: HardwareNode, childSpec: number[]): number[] {
  const maskProp = `${prefix}-map-mask`;
  if (!parent.hasRaw(maskProp)) {
    return childSpec;
  }
  const mask = parent.numbersOf(maskProp);
  if (mask.length !== childSpec.length) {
    throw new PropertyError(
      `expected '${maskProp}' in ${parent.path} to be ${childSpec.length} cells, is ${mask.length} cells`,
      child.path,
    );
  }
  return andCells(childSpec, mask);
}

function passThru(
  prefix: string,
  child: HardwareNode,
  parent: HardwareNode,
  childSpec: number[],
  parentSpec: number[],
): number[] {
  const passProp = `${prefix}-map-pass-thru`;
  if (!parent.hasRaw(passProp)) {
    return parentSpec;
  }
  const pass = parent.numbersOf(passProp);
  if (pass.length !== childSpec.length) {
    throw new PropertyError(
      `expected '${passProp}' in ${parent.path} to be ${childSpec.length} cells, is ${pass.length} cells`,
      child.path,
    );
  }
  const merged = orCells(andCells(childSpec, pass), andCells(parentSpec, notCells(pass)));
  return merged.slice(merged.length - parentSpec.length);
}

/**
 * Follow `<prefix>-map` properties from `parent` until a node without one.
 *
 * @param specLength - parent specifier width of a node named in a map row
 * @param requireController - the final node must have `<prefix>-controller`
 */
export function mapSpecifier(
  prefix: string,
  child: HardwareNode,
  parent: HardwareNode,
  childSpec: number[],
  specLength: (node: HardwareNode) => number,
  requireController: boolean,
): Specifier {
  const mapProp = `${prefix}-map`;
  if (!parent.hasRaw(mapProp)) {
    if (requireController && !parent.hasRaw(`${prefix}-controller`)) {
      throw new PropertyError(`expected '${prefix}-controller' property on ${parent.path} (referenced by ${child.path})`);
    }
    return { controller: parent, data: childSpec };
  }

  const masked = maskSpecifier(prefix, child, parent, childSpec);
  const rows = parent.cellsOf(mapProp);
  const numbers = (from: number, to: number, what: string): number[] => {
    if (rows.length < to) {
      throw new PropertyError(`bad value for '${mapProp}', missing/truncated ${what}`, parent.path);
    }
    return rows.slice(from, to).map(cell => {
      if (isCellRef(cell)) {
        throw new PropertyError(`bad value for '${mapProp}', unexpected reference ${cell.ref} in ${what}`, parent.path);
      }
      return cell;
    });
  };

  let i = 0;
  while (i < rows.length) {
    const entry = numbers(i, i + childSpec.length, 'child data');
    i += childSpec.length;
    if (i >= rows.length) {
      throw new PropertyError(`bad value for '${mapProp}', missing/truncated phandle`, parent.path);
    }
    const mapParent = parent.resolveCell(rows[i], mapProp);
    if (mapParent === null) {
      throw new PropertyError(`bad phandle in '${mapProp}'`, parent.path);
    }
    i += 1;
    const width = specLength(mapParent);
    const parentSpec = numbers(i, i + width, 'parent data');
    i += width;

    if (sameCells(entry, masked)) {
      const next = passThru(prefix, child, parent, childSpec, parentSpec);
      return mapSpecifier(prefix, parent, mapParent, next, specLength, requireController);
    }
  }
  throw new PropertyError(
    `child specifier for ${child.path} (<${childSpec.join(' ')}>) does not appear in '${mapProp}'`,
    parent.path,
  );
}

/**
 * Name the specifier cells with the controller's `<space>-cells` list.
 * A binding without the list names no cells.
 */
export function namedCells(
  node: HardwareNode,
  controller: HardwareNode,
  data: readonly number[],
  space: string,
): Record<string, number> {
  if (controller.bindings.length === 0) {
    throw new PropertyError(`${space} controller ${controller.path} for ${node.path} lacks binding`);
  }
  const names = controller.specifierCells.get(space) ?? [];
  if (names.length !== data.length) {
    throw new PropertyError(
      `unexpected '${space}-cells:' length in binding for ${controller.path} - ` +
        `${names.length} instead of ${data.length}`,
    );
  }
  const named: Record<string, number> = {};
  names.forEach((name, i) => {
    named[name] = data[i];
  });
  return named;
}

/**
 * Resolve a phandle-array property into controllers and named cells.
 */
export function indexedReferenceList(node: HardwareNode, propName: string, space: string): Array<ControllerAndData | null> {
  const specLength = (controller: HardwareNode): number => specifierCells(controller, space, node);
  const elements = phandleValueList(node, propName, space).map((item): ControllerAndData | null => {
    if (item === null) {
      return null;
    }
    const mapped = mapSpecifier(space, node, item.controller, item.data, specLength, false);
    return {
      controller: { path: mapped.controller.path },
      data: namedCells(node, mapped.controller, mapped.data, space),
      name: null,
      basename: space,
    };
  });
  return node.applyNames(space, elements);
}

function ownAddressCells(node: HardwareNode): number {
  const count = node.optionalNumber('#address-cells');
  if (count === undefined) {
    throw new PropertyError('missing #address-cells (while handling interrupt-map)', node.path);
  }
  return count;
}

function interruptCells(node: HardwareNode): number {
  const count = node.optionalNumber('#interrupt-cells');
  if (count === undefined) {
    throw new PropertyError('lacks #interrupt-cells', node.path);
  }
  return count;
}

function rawUnitAddress(node: HardwareNode): number[] {
  if (!node.hasRaw('reg')) {
    throw new PropertyError("lacks 'reg' property (needed for 'interrupt-map' unit address lookup)", node.path);
  }
  const count = addressCells(node);
  const reg = node.numbersOf('reg');
  if (reg.length < count) {
    throw new PropertyError("has too short 'reg' property (while doing 'interrupt-map' unit address lookup)", node.path);
  }
  return reg.slice(0, count);
}

function mapInterrupt(child: HardwareNode, parent: HardwareNode, spec: number[]): Specifier {
  if (parent.hasRaw('interrupt-controller')) {
    return { controller: parent, data: spec };
  }
  const mapped = mapSpecifier(
    'interrupt',
    child,
    parent,
    [...rawUnitAddress(child), ...spec],
    node => ownAddressCells(node) + interruptCells(node),
    true,
  );
  // Drop the unit address part of the final specifier.
  return { controller: mapped.controller, data: mapped.data.slice(ownAddressCells(mapped.controller)) };
}

/**
 * Nearest `interrupt-parent`, searching the node and then its ancestors.
 */
function interruptParent(start: HardwareNode): HardwareNode {
  for (let node: HardwareNode | undefined = start; node !== undefined; node = node.parent) {
    if (node.hasRaw('interrupt-parent')) {
      return node.referencedNode('interrupt-parent');
    }
  }
  throw new PropertyError(
    "has an 'interrupts' property, but neither the node nor any of its parents has an 'interrupt-parent' property",
    start.path,
  );
}

function extendedInterrupts(node: HardwareNode, propName: string): Specifier[] {
  return phandleValueList(node, propName, 'interrupt').map(entry => {
    if (entry === null) {
      throw new PropertyError(`'${propName}' property has an empty element`, node.path);
    }
    return mapInterrupt(node, entry.controller, entry.data);
  });
}

/**
 * The interrupts a node generates, with their final controllers.
 * `interrupts-extended` takes precedence over `interrupts`.
 */
export function nodeInterrupts(node: HardwareNode): ControllerAndData[] {
  let specifiers: Specifier[] = [];
  if (node.hasRaw('interrupts-extended')) {
    specifiers = extendedInterrupts(node, 'interrupts-extended');
  } else if (node.hasRaw('interrupts')) {
    if (node.cellsOf('interrupts').some(isCellRef)) {
      specifiers = extendedInterrupts(node, 'interrupts');
    } else {
      const parent = interruptParent(node);
      const width = interruptCells(parent);
      const entries = sliceCells(
        node.numbersOf('interrupts'),
        width,
        `'interrupts' property in ${node.path}`,
        `<#interrupt-cells> (= ${width})`,
      );
      specifiers = entries.map(entry => mapInterrupt(node, parent, entry));
    }
  }

  const interrupts = specifiers.map(({ controller, data }): ControllerAndData => ({
    controller: { path: controller.path },
    data: namedCells(node, controller, data, 'interrupt'),
    name: null,
    basename: null,
  }));
  return node.applyNames('interrupt', interrupts);
}
