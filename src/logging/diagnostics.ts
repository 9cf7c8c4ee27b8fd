/**
 * Diagnostics — non-fatal findings raised while processing trees.
 *
 * A diagnostic is logged as a warning and recorded, unless the caller
 * escalated it, in which case the matching SettingsError is thrown instead.
 */

import { PropertyError, SchemaError, type SettingsError } from '../errors.js';
import { createLogger, type Logger } from './logger.js';

export type DiagnosticSeverity = 'error' | 'warning';

export type DiagnosticCode =
  | 'unknown-vendor'
  | 'enum-not-tokenizable'
  | 'enum-lowercase-only'
  | 'deprecated-property'
  | 'reg-unit-address-mismatch';

/**
 * A recorded diagnostic.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  /** Node path the finding refers to, if any */
  path?: string;
}

function errorFor(code: DiagnosticCode, message: string, path?: string): SettingsError {
  if (code === 'unknown-vendor') {
    return new SchemaError(message, path);
  }
  return new PropertyError(message, path);
}

/**
 * Collects diagnostics for one processing run.
 */
export class DiagnosticSink {
  private readonly entries: Diagnostic[] = [];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('diagnostics');
  }

  /**
   * Report a finding. With `asError` set the finding is thrown.
   */
  report(code: DiagnosticCode, message: string, options: { path?: string; asError?: boolean } = {}): void {
    if (options.asError) {
      this.entries.push({ code, severity: 'error', message, path: options.path });
      this.logger.error({ code, path: options.path }, message);
      throw errorFor(code, message, options.path);
    }
    this.entries.push({ code, severity: 'warning', message, path: options.path });
    this.logger.warn({ code, path: options.path }, message);
  }

  /** All diagnostics recorded so far, in report order */
  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  warnings(code?: DiagnosticCode): Diagnostic[] {
    return this.entries.filter(d => d.severity === 'warning' && (code === undefined || d.code === code));
  }
}
