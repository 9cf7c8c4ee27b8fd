/**
 * Tests for DiagnosticSink.
 */

import { describe, it, expect } from 'vitest';
import { DiagnosticSink } from './diagnostics.js';
import { PropertyError, SchemaError } from '../errors.js';

describe('DiagnosticSink', () => {
  it('records warnings in order', () => {
    const sink = new DiagnosticSink();
    sink.report('deprecated-property', "'old-prop' is deprecated", { path: '/a' });
    sink.report('enum-lowercase-only', 'enum is lowercase only');

    expect(sink.diagnostics).toEqual([
      { code: 'deprecated-property', severity: 'warning', message: "'old-prop' is deprecated", path: '/a' },
      { code: 'enum-lowercase-only', severity: 'warning', message: 'enum is lowercase only', path: undefined },
    ]);
    expect(sink.warnings('enum-lowercase-only')).toHaveLength(1);
  });

  it('throws a property error for escalated property findings', () => {
    const sink = new DiagnosticSink();
    expect(() => sink.report('deprecated-property', 'gone', { path: '/a', asError: true }))
      .toThrow(PropertyError);
    expect(sink.diagnostics[0]?.severity).toBe('error');
  });

  it('throws a schema error for escalated vendor findings', () => {
    const sink = new DiagnosticSink();
    expect(() => sink.report('unknown-vendor', "unknown vendor 'acme'", { asError: true }))
      .toThrow(SchemaError);
  });
});
