/**
 * Tests for DependencyGraph.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DependencyGraph, pathSortKey } from './DependencyGraph.js';
import { GraphError } from '../errors.js';

describe('pathSortKey', () => {
  it('splits a path into parent and name', () => {
    expect(pathSortKey('/soc/uart@1000')).toEqual(['/soc', 'uart@1000']);
    expect(pathSortKey('/soc')).toEqual(['/', 'soc']);
    expect(pathSortKey('/')).toEqual(['/', '']);
  });
});

describe('DependencyGraph', () => {
  let graph: DependencyGraph;

  beforeEach(() => {
    graph = new DependencyGraph();
  });

  describe('basic operations', () => {
    it('starts empty', () => {
      expect(graph.size).toBe(0);
      expect(graph.orderedSccs).toEqual([]);
    });

    it('adds both endpoints of an edge', () => {
      graph.addEdge('/a', '/b');
      expect(graph.has('/a')).toBe(true);
      expect(graph.has('/b')).toBe(true);
      expect(graph.getEdges()).toEqual([['/a', '/b']]);
    });

    it('sorts direct dependencies and dependents', () => {
      graph.addEdge('/z', '/');
      graph.addEdge('/a', '/');
      graph.addEdge('/a', '/z');

      expect(graph.requiredBy('/')).toEqual(['/a', '/z']);
      expect(graph.dependsOn('/a')).toEqual(['/', '/z']);
      expect(graph.dependsOn('/')).toEqual([]);
    });

    it('keeps self edges out of the dependents', () => {
      graph.addEdge('/a', '/a');
      expect(graph.dependsOn('/a')).toEqual(['/a']);
      expect(graph.requiredBy('/a')).toEqual([]);
      expect(graph.orderedSccs).toEqual([['/a']]);
    });
  });

  describe('orderedSccs', () => {
    it('returns components in dependency order', () => {
      graph.addEdge('/a', '/b');
      graph.addEdge('/c', '/b');

      expect(graph.orderedSccs).toEqual([['/b'], ['/a'], ['/c']]);
    });

    it('orders unconnected roots by parent path, then name', () => {
      graph.addVertex('/b/x');
      graph.addVertex('/c');

      expect(graph.orderedSccs).toEqual([['/c'], ['/b/x']]);
    });

    it('finds cycles not reachable from any root', () => {
      graph.addEdge('/c', '/');
      graph.addEdge('/a', '/');
      graph.addEdge('/b', '/');
      graph.addEdge('/a', '/b');
      graph.addEdge('/b', '/a');

      expect(graph.orderedSccs).toEqual([['/'], ['/c'], ['/b', '/a']]);
    });

    it('throws when a non-empty graph has no roots', () => {
      graph.addEdge('/a', '/b');
      graph.addEdge('/b', '/a');

      expect(() => graph.orderedSccs).toThrow(GraphError);
      expect(() => graph.orderedSccs).toThrow('No roots found in graph with 2 nodes');
    });

    it('starts from an explicit root', () => {
      const rooted = new DependencyGraph(pathSortKey, '/');
      rooted.addEdge('/a', '/');

      expect(rooted.orderedSccs).toEqual([['/'], ['/a']]);
    });

    it('recomputes after a change', () => {
      graph.addVertex('/');
      expect(graph.orderedSccs).toEqual([['/']]);

      graph.addEdge('/a', '/');
      expect(graph.orderedSccs).toEqual([['/'], ['/a']]);
    });
  });
});
