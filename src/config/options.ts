/**
 * Runtime options for partial trees and the merged tree.
 *
 * Options are validated with zod and defaults filled in by the schemas, so
 * callers may pass any subset.
 */

import { z } from 'zod';

export const PartialTreeOptionsSchema = z.object({
  /** Raise instead of warn when a deprecated property is present */
  errOnDeprecated: z.boolean().default(false),
});

export const HardwareTreeOptionsSchema = PartialTreeOptionsSchema.extend({
  warnRegUnitAddressMismatch: z.boolean().default(true),
  /** Give unbound nodes types for the standard properties */
  defaultPropTypes: z.boolean().default(true),
  /** `fixed-partitions` nodes sit on no bus */
  supportFixedPartitionsOnAnyBus: z.boolean().default(true),
  inferBindingForPaths: z.array(z.string().startsWith('/')).default([]),
});

export const SettingsTreeOptionsSchema = z.object({
  /** Vendor prefix -> vendor name; absent disables vendor checks */
  vendorPrefixes: z.map(z.string(), z.string()).optional(),
  errOnMissingVendor: z.boolean().default(false),
});

export type PartialTreeOptions = z.input<typeof PartialTreeOptionsSchema>;
export type ResolvedPartialTreeOptions = z.output<typeof PartialTreeOptionsSchema>;
export type HardwareTreeOptions = z.input<typeof HardwareTreeOptionsSchema>;
export type ResolvedHardwareTreeOptions = z.output<typeof HardwareTreeOptionsSchema>;
export type SettingsTreeOptions = z.input<typeof SettingsTreeOptionsSchema>;
export type ResolvedSettingsTreeOptions = z.output<typeof SettingsTreeOptionsSchema>;
