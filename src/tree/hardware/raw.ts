/**
 * Raw hardware source values.
 *
 * The hardware source text is parsed elsewhere; this library receives every
 * node as a path, its labels and its decoded property values. Values keep
 * the shape they had in the source: empty, a cell list (u32 numbers and
 * node references), bytes, strings, a path reference, or a compound of
 * several of those.
 */

/**
 * A reference inside a cell list: `&label`, `label`, `&{/path}` or `/path`.
 */
export interface CellRef {
  ref: string;
}

export type Cell = number | CellRef;

export type RawHardwareValue =
  | { type: 'empty' }
  | { type: 'cells'; cells: readonly Cell[] }
  | { type: 'bytes'; bytes: Uint8Array }
  | { type: 'strings'; strings: readonly string[] }
  | { type: 'path'; ref: string }
  | { type: 'compound'; parts: readonly RawHardwareValue[] };

/**
 * One node as delivered by the hardware source parser.
 */
export interface RawHardwareNode {
  path: string;
  labels?: readonly string[];
  properties?: Readonly<Record<string, RawHardwareValue>>;
}

export interface RawHardwareTree {
  /** Where the tree was read from */
  source?: string;
  nodes: readonly RawHardwareNode[];
}

/**
 * Classification of a raw value, used for inferred bindings and messages.
 */
export type RawHardwareType =
  | 'empty'
  | 'bytes'
  | 'num'
  | 'nums'
  | 'string'
  | 'strings'
  | 'phandle'
  | 'phandles'
  | 'phandles-and-nums'
  | 'path'
  | 'compound';

export function isCellRef(cell: Cell): cell is CellRef {
  return typeof cell !== 'number';
}

export function rawTypeOf(value: RawHardwareValue): RawHardwareType {
  switch (value.type) {
    case 'empty':
      return 'empty';
    case 'bytes':
      return 'bytes';
    case 'path':
      return 'path';
    case 'compound':
      return 'compound';
    case 'strings':
      if (value.strings.length === 0) {
        return 'compound';
      }
      return value.strings.length === 1 ? 'string' : 'strings';
    case 'cells': {
      const refs = value.cells.filter(isCellRef).length;
      if (refs === 0) {
        return value.cells.length === 1 ? 'num' : 'nums';
      }
      if (refs === value.cells.length) {
        return refs === 1 ? 'phandle' : 'phandles';
      }
      return 'phandles-and-nums';
    }
  }
}

function formatRef(target: string): string {
  if (target.startsWith('&')) {
    return target;
  }
  return target.startsWith('/') ? `&{${target}}` : `&${target}`;
}

/**
 * Render a raw value as it would appear in the source.
 */
export function formatRawValue(value: RawHardwareValue): string {
  switch (value.type) {
    case 'empty':
      return '<empty>';
    case 'cells':
      return `< ${value.cells.map(c => (isCellRef(c) ? formatRef(c.ref) : `0x${c.toString(16)}`)).join(' ')} >`;
    case 'bytes':
      return `[ ${Array.from(value.bytes, b => b.toString(16).padStart(2, '0')).join(' ')} ]`;
    case 'strings':
      return value.strings.map(s => JSON.stringify(s)).join(', ');
    case 'path':
      return formatRef(value.ref);
    case 'compound':
      return value.parts.map(formatRawValue).join(', ');
  }
}

export const empty = (): RawHardwareValue => ({ type: 'empty' });

export const ref = (target: string): CellRef => ({ ref: target });

export function cells(...values: Cell[]): RawHardwareValue {
  return { type: 'cells', cells: values };
}

export function bytes(...values: number[]): RawHardwareValue {
  return { type: 'bytes', bytes: Uint8Array.from(values) };
}

export function strings(...values: string[]): RawHardwareValue {
  return { type: 'strings', strings: values };
}

export function pathRef(target: string): RawHardwareValue {
  return { type: 'path', ref: target };
}

export function compound(...parts: RawHardwareValue[]): RawHardwareValue {
  return { type: 'compound', parts };
}

/**
 * Nested node description accepted by defineHardwareTree().
 */
export interface HardwareNodeDefinition {
  labels?: string[];
  props?: Record<string, RawHardwareValue>;
  children?: Record<string, HardwareNodeDefinition>;
}

/**
 * Flatten a nested node description into a raw tree, parents first.
 *
 * @example
 * defineHardwareTree({
 *   children: {
 *     'uart@1000': { labels: ['uart0'], props: { compatible: strings('acme,uart') } },
 *   },
 * });
 */
export function defineHardwareTree(root: HardwareNodeDefinition, source = '<inline>'): RawHardwareTree {
  const nodes: RawHardwareNode[] = [];
  const visit = (path: string, def: HardwareNodeDefinition): void => {
    nodes.push({ path, labels: def.labels ?? [], properties: def.props ?? {} });
    for (const [name, child] of Object.entries(def.children ?? {})) {
      visit(path === '/' ? `/${name}` : `${path}/${name}`, child);
    }
  };
  visit('/', root);
  return { source, nodes };
}

/**
 * Render a raw tree as hardware source text, children nested under their
 * parents in input order.
 */
export function formatHardwareTree(tree: RawHardwareTree): string {
  const children = new Map<string, RawHardwareNode[]>();
  for (const node of tree.nodes) {
    if (node.path === '/') {
      continue;
    }
    const parent = node.path.slice(0, node.path.lastIndexOf('/')) || '/';
    children.set(parent, [...(children.get(parent) ?? []), node]);
  }

  const lines: string[] = ['/dts-v1/;', ''];
  const render = (node: RawHardwareNode, depth: number): void => {
    const indent = '\t'.repeat(depth);
    const name = node.path === '/' ? '/' : node.path.slice(node.path.lastIndexOf('/') + 1);
    const labels = (node.labels ?? []).map(label => `${label}: `).join('');
    lines.push(`${indent}${labels}${name} {`);
    for (const [prop, value] of Object.entries(node.properties ?? {})) {
      lines.push(value.type === 'empty' ? `${indent}\t${prop};` : `${indent}\t${prop} = ${formatRawValue(value)};`);
    }
    for (const child of children.get(node.path) ?? []) {
      render(child, depth + 1);
    }
    lines.push(`${indent}};`);
  };
  const root = tree.nodes.find(node => node.path === '/');
  if (root !== undefined) {
    render(root, 0);
  }
  return lines.join('\n') + '\n';
}
