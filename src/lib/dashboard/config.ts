/**
 * Dashboard configuration
 *
 * Everything a session needs besides the entity table. Every field has a
 * default, so `parseDashboardConfig({})` yields a working configuration.
 */

import { z } from 'zod';
import {
  CategoricalPaletteSchema,
  ContinuousPaletteSchema,
  DEFAULT_BASE_STYLE,
  DEFAULT_UNSELECTED_STYLE,
  StyleSchema,
} from './aesthetics';
import { DEFAULT_WEBGL_THRESHOLD } from './adapters/scatter';
import { DEFAULT_BIN_COUNT, TIME_PLOTS } from './adapters/time';
import { ConfigError } from './errors';
import { DEFAULT_CACHE_CAPACITY } from './figureCache';

export const DashboardConfigSchema = z.object({
  /** Grouping attribute; null or 'none' disables grouping */
  grouping: z.string().nullable().default(null),
  /** Requested PC axes; missing or unknown ones fall back to the first free axes */
  axes: z.array(z.string()).default([]),
  dimensions: z.union([z.literal(2), z.literal(3)]).default(2),
  /** Ids selected at startup */
  presetSelection: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
  style: z
    .object({
      base: StyleSchema.default(DEFAULT_BASE_STYLE),
      unselected: StyleSchema.default(DEFAULT_UNSELECTED_STYLE),
      continuousPalette: ContinuousPaletteSchema.default('viridis'),
      categoricalPalette: CategoricalPaletteSchema.default('plotly'),
    })
    .default({}),
  legend: z
    .object({
      show: z.boolean().default(true),
      /** Abbreviate legend labels to this many characters, 0 keeps them whole */
      labelLength: z.number().int().min(0).default(0),
    })
    .default({}),
  scatter: z
    .object({
      webglThreshold: z.number().int().positive().default(DEFAULT_WEBGL_THRESHOLD),
    })
    .default({}),
  time: z
    .object({
      plot: z.enum(TIME_PLOTS).default('scatter'),
      nbins: z.number().int().min(1).max(1000).default(DEFAULT_BIN_COUNT),
      invert: z.boolean().default(false),
      label: z.string().min(1).default('Time'),
    })
    .default({}),
  hover: z
    .object({
      /** Show the hover columns, not just the id and group */
      detailed: z.boolean().default(false),
      /** Columns of the detailed hover; null starts from the table columns */
      columns: z.array(z.string()).nullable().default(null),
    })
    .default({}),
  table: z
    .object({
      /** Attribute columns after `id`; null shows every attribute */
      columns: z.array(z.string()).nullable().default(null),
    })
    .default({}),
  cache: z
    .object({
      capacity: z.number().int().min(1).default(DEFAULT_CACHE_CAPACITY),
    })
    .default({}),
  /** Saved aesthetics overrides, in either supported document layout */
  aesthetics: z.unknown().optional(),
});

export type DashboardConfig = z.infer<typeof DashboardConfigSchema>;
export type DashboardConfigInput = z.input<typeof DashboardConfigSchema>;

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws ConfigError listing every invalid field
 */
export function parseDashboardConfig(input: unknown = {}): DashboardConfig {
  const result = DashboardConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
