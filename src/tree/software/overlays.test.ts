/**
 * Tests for configuration overlays.
 */

import { describe, it, expect } from 'vitest';
import { applyOverlays, parseOverlays } from './overlays.js';
import { SourceError } from '../../errors.js';

describe('parseOverlays', () => {
  it('returns the overlay list', () => {
    expect(parseOverlays('- /:\n    a: 1\n', 'app.yaml')).toEqual([{ '/': { a: 1 } }]);
  });

  it('rejects documents that are not lists', () => {
    expect(() => parseOverlays('a: 1\n', 'app.yaml')).toThrow('expected a list of configuration overlays in app.yaml');
  });

  it('rejects invalid YAML', () => {
    expect(() => parseOverlays('- [a\n', 'app.yaml')).toThrow(SourceError);
  });
});

describe('applyOverlays', () => {
  describe('absolute mount points', () => {
    it('merges overlays in order', () => {
      expect(applyOverlays([{ '/': { a: { x: 1 } } }, { '/a': { y: 2 } }])).toEqual({ a: { x: 1, y: 2 } });
    });

    it('creates missing nodes on the way', () => {
      expect(applyOverlays([{ '/a/b': { z: 1 } }])).toEqual({ a: { b: { z: 1 } } });
    });

    it('replaces non-map values', () => {
      expect(applyOverlays([{ '/': { l: [1, 2], s: 'a' } }, { '/': { l: [3], s: 'b' } }])).toEqual({ l: [3], s: 'b' });
    });

    it('rejects mount points running through a property', () => {
      expect(() => applyOverlays([{ '/': { a: 1 } }, { '/a/b': {} }])).toThrow(
        "/a: mount point '/a/b' runs through property 'a'",
      );
    });
  });

  describe('label mount points', () => {
    it('mounts on the node with that name', () => {
      const merged = applyOverlays([{ '/': { net: { radio: { ch: 1 } } } }, { radio: { ch: 2, pan: 3 } }]);
      expect(merged).toEqual({ net: { radio: { ch: 2, pan: 3 } } });
    });

    it('rejects labels that name no node', () => {
      expect(() => applyOverlays([{ radio: { ch: 2 } }])).toThrow("target label 'radio' of overlay not found");
    });

    it('rejects labels that name several nodes', () => {
      const overlays = [{ '/': { a: { radio: {} }, b: { radio: {} } } }, { radio: { ch: 1 } }];
      expect(() => applyOverlays(overlays)).toThrow("target label 'radio' of overlay is not unique");
    });

    it('rejects relative paths', () => {
      expect(() => applyOverlays([{ 'a/b': {} }])).toThrow('should be either an absolute path or a label');
    });
  });

  it('skips snippet keys', () => {
    expect(applyOverlays([{ 'x-defaults': { ch: 9 }, '/': { a: {} } }])).toEqual({ a: {} });
  });

  it('keeps nodes shared through aliases independent', () => {
    const text = [
      '- x-radio: &radio',
      '    channel: 11',
      '  /:',
      '    net:',
      '      a: *radio',
      '      b: *radio',
      '- /net/a:',
      '    channel: 26',
      '',
    ].join('\n');
    expect(applyOverlays(parseOverlays(text, 'app.yaml'))).toEqual({
      net: { a: { channel: 26 }, b: { channel: 11 } },
    });
  });

  it('does not modify its input', () => {
    const overlays = [{ '/': { a: { x: 1 } } }, { '/a': { x: 2 } }];
    applyOverlays(overlays);
    expect(overlays[0]).toEqual({ '/': { a: { x: 1 } } });
  });

  it('rejects overlays that are not maps', () => {
    expect(() => applyOverlays(['a'])).toThrow(SourceError);
    expect(() => applyOverlays([{ '/': 1 }])).toThrow("overlay for mount point '/' should be a configuration node");
  });
});
