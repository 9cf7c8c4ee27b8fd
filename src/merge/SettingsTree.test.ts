/**
 * Tests for the merged settings tree.
 */

import { describe, it, expect } from 'vitest';
import { stringify } from 'yaml';
import { SettingsTree } from './SettingsTree.js';
import { createBindingCatalog } from '../binding/BindingCatalog.js';
import { GraphError, MergeError, PropertyError, SchemaError, StateError } from '../errors.js';
import { HardwareTree } from '../tree/hardware/HardwareTree.js';
import { HardwareNode } from '../tree/hardware/HardwareNode.js';
import { cells, defineHardwareTree, ref, strings, type HardwareNodeDefinition } from '../tree/hardware/raw.js';
import { ConfigTree } from '../tree/software/ConfigTree.js';
import { ConfigNode } from '../tree/software/ConfigNode.js';
import type { SettingsTreeOptions } from '../config/options.js';
import type { MergedEntity } from './MergedEntity.js';

function catalogOf(docs: Record<string, object>) {
  const files: Record<string, string> = {};
  for (const [path, doc] of Object.entries(docs)) {
    files[path] = stringify(doc);
  }
  return createBindingCatalog(files);
}

const HARDWARE_BINDINGS = catalogOf({
  'acme,uart.yaml': {
    description: 'Test UART',
    compatible: 'acme,uart',
    properties: { reg: { type: 'array' }, 'current-speed': { type: 'int' }, dma: { type: 'phandle' } },
  },
  'acme,dma.yaml': {
    description: 'Test DMA controller',
    compatible: 'acme,dma',
    properties: { reg: { type: 'array' } },
  },
});

const CONFIG_BINDINGS = catalogOf({
  'acme,uart-config.yaml': {
    description: 'UART settings',
    schema: 'acme,uart-config',
    properties: { baud: { type: 'int' }, log: { type: 'pointer' } },
  },
  'acme,app.yaml': {
    description: 'Application',
    schema: 'acme,app',
    properties: { console: { type: 'pointer' } },
  },
  'acme,speed.yaml': {
    description: 'Speed override',
    schema: 'acme,speed',
    properties: { 'current-speed': { type: 'int' } },
  },
});

function board(children: Record<string, HardwareNodeDefinition>): HardwareTree {
  const root: HardwareNodeDefinition = {
    props: { '#address-cells': cells(1), '#size-cells': cells(1), compatible: strings('acme,board') },
    children,
  };
  return new HardwareTree(defineHardwareTree(root, 'board.dts'), HARDWARE_BINDINGS);
}

const DMA: HardwareNodeDefinition = {
  labels: ['dma0'],
  props: { compatible: strings('acme,dma'), reg: cells(0x1000, 0x10) },
};

const UART: HardwareNodeDefinition = {
  labels: ['uart0'],
  props: {
    compatible: strings('acme,uart'),
    reg: cells(0x2000, 0x10),
    'current-speed': cells(115200),
    dma: cells(ref('&dma0')),
  },
};

function dmaUser(labels: string[], target: string): HardwareNodeDefinition {
  return { labels, props: { compatible: strings('acme,uart'), dma: cells(ref(target)) } };
}

function config(nodes: Record<string, unknown>): ConfigTree {
  return new ConfigTree({ source: 'app.yaml', overlays: [{ '/': nodes }] }, CONFIG_BINDINGS);
}

const APP_CONFIG = {
  'uart@2000': { schema: 'acme,uart-config', baud: 9600 },
  app: { schema: 'acme,app', console: '&uart0' },
};

function merged(
  hardware = board({ 'dma@1000': DMA, 'uart@2000': UART }),
  software: ConfigTree | null = config(APP_CONFIG),
  options: SettingsTreeOptions = {},
): SettingsTree {
  const tree = new SettingsTree(options).addSource(hardware);
  if (software !== null) {
    tree.addSource(software);
  }
  return tree.process();
}

function entityAt(tree: SettingsTree, path: string): MergedEntity {
  const entity = tree.entityByPath(path);
  if (entity === undefined) {
    throw new Error(`no entity at ${path}`);
  }
  return entity;
}

const paths = (entities: readonly MergedEntity[]): string[] => entities.map(e => e.path);

describe('SettingsTree', () => {
  describe('state', () => {
    it('rejects queries before processing', () => {
      const tree = new SettingsTree();
      expect(() => tree.entities).toThrow(StateError);
      expect(() => tree.entityByPath('/')).toThrow(StateError);
    });

    it('requires a source before processing', () => {
      expect(() => new SettingsTree().process()).toThrow(StateError);
    });

    it('rejects sources after processing', () => {
      const tree = merged();
      expect(tree.state).toBe('processed');
      expect(() => tree.addSource(config({}))).toThrow(StateError);
      expect(() => tree.process()).toThrow(StateError);
    });

    it('rejects a second source of the same kind', () => {
      const tree = new SettingsTree().addSource(config({}));
      expect(() => tree.addSource(config({}))).toThrow('a software source has already been added');
    });

    it('rejects sources that were processed on their own', () => {
      const software = config({});
      software.process();
      expect(() => new SettingsTree().addSource(software)).toThrow(StateError);
    });
  });

  describe('merging', () => {
    it('merges same-path nodes in source order', () => {
      const tree = merged();
      expect(paths(tree.entities)).toEqual(['/', '/dma@1000', '/uart@2000', '/app']);
      expect(tree.sources.map(s => s.kind)).toEqual(['hardware', 'software']);
      expect(tree.sourceOf('software')?.sourcePath).toBe('app.yaml');
    });

    it('unions properties, schemas and bindings', () => {
      const uart = entityAt(merged(), '/uart@2000');

      expect([...uart.properties.keys()]).toEqual(['reg', 'current-speed', 'dma', 'baud']);
      expect(uart.properties.get('baud')?.value).toBe(9600);
      expect(uart.schemas).toEqual(['acme,uart', 'acme,uart-config']);
      expect(uart.bindingPaths).toEqual(['acme,uart.yaml', 'acme,uart-config.yaml']);
      expect(uart.sourcePaths).toEqual(['board.dts', 'app.yaml']);
      expect(uart.description).toBe('Test UART');
    });

    it('exposes the per-source nodes', () => {
      const uart = entityAt(merged(), '/uart@2000');

      expect(uart.nodeOf(HardwareNode)?.regs).toEqual([{ name: null, addr: 0x2000n, size: 0x10n }]);
      expect(uart.nodeOf(ConfigNode)?.sourcePath).toBe('app.yaml');
      expect(entityAt(merged(), '/app').nodeOf(HardwareNode)).toBeUndefined();
    });

    it('combines children of all sources', () => {
      const tree = merged();
      expect(paths(entityAt(tree, '/').children)).toEqual(['/dma@1000', '/uart@2000', '/app']);
      expect(entityAt(tree, '/app').parent?.path).toBe('/');
    });

    it('resolves references into earlier sources', () => {
      const tree = merged();
      expect(entityAt(tree, '/app').properties.get('console')?.value).toEqual({ path: '/uart@2000' });
    });

    it('rejects a property defined by two sources', () => {
      const software = config({ 'uart@2000': { schema: 'acme,speed', 'current-speed': 9600 } });
      expect(() => merged(undefined, software)).toThrow(
        "/uart@2000: property 'current-speed' is defined by both board.dts and app.yaml",
      );
    });

    it('rejects sources disagreeing on the enabled state', () => {
      const disabled = { ...UART, props: { ...UART.props, status: strings('disabled') } };
      const hardware = board({ 'dma@1000': DMA, 'uart@2000': disabled });
      expect(() => merged(hardware, config({ 'uart@2000': {} }))).toThrow(MergeError);
    });
  });

  describe('labels', () => {
    it('publishes unique labels of every source', () => {
      const tree = merged();

      expect([...tree.labels.keys()]).toEqual(['dma0', 'uart0', 'uart@2000', 'app']);
      expect(entityAt(tree, '/uart@2000').labels).toEqual(['uart0', 'uart@2000']);
      expect(tree.entityByLabel('uart0')?.path).toBe('/uart@2000');
    });

    it('drops labels carried by several entities', () => {
      const hardware = board({ 'dma@1000': { ...DMA, labels: ['dma0', 'app'] }, 'uart@2000': UART });
      const tree = merged(hardware);

      expect(tree.entityByLabel('app')).toBeUndefined();
      expect(entityAt(tree, '/dma@1000').labels).toEqual(['dma0']);
      expect(entityAt(tree, '/dma@1000').labelCandidates).toEqual(['dma0', 'app']);
      expect(tree.entityByPath('/app')?.path).toBe('/app');
    });
  });

  describe('ordinals', () => {
    it('orders dependencies before their dependents', () => {
      const tree = merged();

      expect(tree.orderedSccs.map(paths)).toEqual([['/'], ['/dma@1000'], ['/uart@2000'], ['/app']]);
      expect(tree.entities.map(e => e.dependencyOrdinal)).toEqual([0, 1, 2, 3]);
      expect(tree.entityByOrdinal(2)?.path).toBe('/uart@2000');
    });

    it('records direct dependencies and dependents', () => {
      const uart = entityAt(merged(), '/uart@2000');
      expect(paths(uart.dependsOn)).toEqual(['/', '/dma@1000']);
      expect(paths(uart.requiredBy)).toEqual(['/app']);
    });

    it('gives every edge target a lower ordinal', () => {
      const tree = merged();
      for (const entity of tree.entities) {
        for (const dependency of entity.dependsOn) {
          expect(dependency.dependencyOrdinal).toBeLessThan(entity.dependencyOrdinal);
        }
      }
    });

    it('rejects dependency loops and assigns no ordinal', () => {
      const hardware = board({
        'uart@1': dmaUser(['u1'], '&u2'),
        'uart@2': dmaUser(['u2'], '&u1'),
        'uart@3': dmaUser([], '&u1'),
      });
      const tree = new SettingsTree().addSource(hardware);

      expect(() => tree.process()).toThrow('Dependency loop detected: /uart@2, /uart@1');
      expect(tree.state).toBe('has-nodes');
      expect(() => entityAt(tree, '/uart@1').dependencyOrdinal).toThrow(StateError);
      expect(() => entityAt(tree, '/uart@3').dependencyOrdinal).toThrow(StateError);
    });

    it('rejects graphs without roots', () => {
      const hardware = board({
        'uart@1': dmaUser(['u1'], '&u2'),
        'uart@2': dmaUser(['u2'], '&u1'),
      });
      expect(() => merged(hardware, null)).toThrow(GraphError);
    });
  });

  describe('schema tables', () => {
    it('lists enabled entities before disabled ones', () => {
      const disabled = { props: { compatible: strings('acme,uart'), reg: cells(0x1800, 0x10), status: strings('disabled') } };
      const tree = merged(board({ 'uart@1800': disabled, 'dma@1000': DMA, 'uart@2000': UART }));

      expect(paths(tree.entitiesForSchema('acme,uart'))).toEqual(['/uart@2000', '/uart@1800']);
      expect(paths(tree.enabledForSchema('acme,uart'))).toEqual(['/uart@2000']);
      expect(paths(tree.disabledForSchema('acme,uart'))).toEqual(['/uart@1800']);
      expect(tree.entitiesForSchema('acme,none')).toEqual([]);
      expect([...tree.schemas].sort()).toEqual(['acme,app', 'acme,board', 'acme,dma', 'acme,uart', 'acme,uart-config']);
    });

    it('records vendors and models for known prefixes', () => {
      const tree = merged(undefined, undefined, { vendorPrefixes: new Map([['acme', 'Acme Corp']]) });
      expect(tree.vendorOf('acme,uart')).toBe('Acme Corp');
      expect(tree.modelOf('acme,uart-config')).toBe('uart-config');
      expect(tree.diagnostics.warnings('unknown-vendor')).toEqual([]);
    });

    it('warns about unknown vendors except on the root', () => {
      const tree = merged(undefined, undefined, { vendorPrefixes: new Map([['other', 'Other Inc']]) });
      const warnings = tree.diagnostics.warnings('unknown-vendor');

      expect(warnings.map(w => w.path)).toEqual(['/dma@1000', '/uart@2000', '/uart@2000', '/app']);
      expect(warnings[0]?.message).toBe("schema 'acme,dma' has unknown vendor prefix 'acme'");
      expect(tree.vendorOf('acme,uart')).toBeUndefined();
    });

    it('raises unknown vendors as errors on request', () => {
      const options = { vendorPrefixes: new Map([['other', 'Other Inc']]), errOnMissingVendor: true };
      expect(() => merged(undefined, undefined, options)).toThrow(SchemaError);
    });

    it('rejects malformed schema identifiers', () => {
      const hardware = board({ 'node@1': { props: { compatible: strings('9bad') } } });
      expect(() => merged(hardware, null)).toThrow(PropertyError);
    });
  });

  describe('entities', () => {
    it('derives path identifiers', () => {
      expect(entityAt(merged(), '/uart@2000').pathId).toBe('N_S_uart_2000');
      expect(entityAt(merged(), '/').pathId).toBe('N');
    });
  });
});
