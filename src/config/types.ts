/**
 * Configuration types for the warehouse catalog.
 *
 * Config is loaded from YAML at boot time and validated against
 * `catalogConfigSchema`.
 */

import { z } from 'zod';
import { tabularDeleteProfileSchema } from '../domain/types';

export const CONFIG_VERSION = '1';

export const catalogConfigSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform(v => String(v))
    .refine(v => v === CONFIG_VERSION || v === `${CONFIG_VERSION}.0`, v => ({
      message: `Unsupported config version: ${v}. Expected '${CONFIG_VERSION}'.`,
    }))
    .transform(() => CONFIG_VERSION),
  database: z
    .object({
      busyTimeoutMs: z.number().int().nonnegative().default(5000),
    })
    .default({}),
  warehouses: z
    .object({
      defaultTabularDeleteProfile: tabularDeleteProfileSchema.default({ type: 'hard' }),
    })
    .default({}),
});

export type CatalogConfig = z.output<typeof catalogConfigSchema>;
