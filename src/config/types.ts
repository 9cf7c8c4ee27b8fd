/**
 * Configuration types for settings-tree builds.
 *
 * A build is described by a YAML file (settings.yaml) naming the binding
 * directories of both sources, the software configuration overlays and the
 * vendor prefix tables.
 */

import type { LogLevel } from '../logging/logger.js';

/**
 * Hardware description source configuration.
 */
export interface HardwareConfig {
  /** Directories searched recursively for binding documents */
  bindingsDirs: string[];
  /** Warn when a node's unit address differs from its first register */
  warnRegUnitAddressMismatch: boolean;
  /** Node paths whose bindings are inferred from their raw values */
  inferBindingForPaths: string[];
}

/**
 * Software configuration source.
 */
export interface SoftwareConfig {
  /** Overlay files, applied in order */
  sources: string[];
  /** Directories searched recursively for binding documents */
  bindingsDirs: string[];
}

/**
 * Complete build configuration.
 */
export interface SettingsConfig {
  logLevel: LogLevel;
  /** Escalate deprecated-property and unknown-vendor diagnostics to errors */
  strict: boolean;
  /** Vendor prefix tables (`prefix<TAB>vendor name` per line) */
  vendorPrefixes: string[];
  hardware: HardwareConfig;
  /** Absent when the build has no software configuration */
  software?: SoftwareConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: SettingsConfig = {
  logLevel: 'info',
  strict: false,
  vendorPrefixes: [],
  hardware: {
    bindingsDirs: [],
    warnRegUnitAddressMismatch: true,
    inferBindingForPaths: [],
  },
};
