/**
 * Build — assembles a processed SettingsTree from a build configuration.
 *
 * This module handles:
 * - Loading vendor prefix tables and binding catalogs
 * - Creating the hardware and (optional) software partial trees
 * - Mapping strict mode onto deprecated-property and unknown-vendor errors
 *
 * It does NOT handle:
 * - Parsing hardware source text (the caller supplies the raw tree)
 */

import { loadBindingCatalog } from './binding/BindingCatalog.js';
import { HardwareTree } from './tree/hardware/HardwareTree.js';
import { ConfigTree } from './tree/software/ConfigTree.js';
import { SettingsTree } from './merge/SettingsTree.js';
import { loadVendorPrefixes } from './merge/vendor-prefixes.js';
import { DiagnosticSink } from './logging/diagnostics.js';
import { createLogger } from './logging/logger.js';
import type { RawHardwareTree } from './tree/hardware/raw.js';
import type { SettingsConfig } from './config/types.js';

export async function buildSettingsTree(config: SettingsConfig, hardwareTree: RawHardwareTree): Promise<SettingsTree> {
  const logger = createLogger('build', { level: config.logLevel });
  const diagnostics = new DiagnosticSink(logger);

  const vendorPrefixes = config.vendorPrefixes.length > 0 ? await loadVendorPrefixes(config.vendorPrefixes) : undefined;
  const settings = new SettingsTree({ vendorPrefixes, errOnMissingVendor: config.strict }, diagnostics);

  const hardwareCatalog = await loadBindingCatalog({ dirs: config.hardware.bindingsDirs });
  settings.addSource(
    new HardwareTree(
      hardwareTree,
      hardwareCatalog,
      {
        errOnDeprecated: config.strict,
        warnRegUnitAddressMismatch: config.hardware.warnRegUnitAddressMismatch,
        inferBindingForPaths: config.hardware.inferBindingForPaths,
      },
      diagnostics,
    ),
  );

  if (config.software !== undefined) {
    const softwareCatalog = await loadBindingCatalog({ dirs: config.software.bindingsDirs });
    const software = await ConfigTree.fromFiles(
      config.software.sources,
      softwareCatalog,
      { errOnDeprecated: config.strict },
      diagnostics,
    );
    settings.addSource(software);
  }

  logger.debug({ sources: settings.sources.length, bindingFiles: hardwareCatalog.size }, 'processing settings tree');
  return settings.process();
}
