/**
 * Aesthetics Manager
 *
 * Computes per-entity marker styles from the active grouping attribute,
 * layers user overrides on top, and persists both.
 *
 * Precedence, resolved independently for every style field:
 *   entity override > group override > computed default
 *
 * Overrides survive grouping changes: group overrides are stored per
 * grouping attribute, entity overrides per id.
 */

import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import type {
  AestheticOverrides,
  AestheticsTable,
  AttributeValue,
  CategoricalPalette,
  ContinuousPalette,
  EntityTable,
  Style,
  StyleOverride,
} from '@/types/dashboard';
import { AestheticsFormatError, type UnknownAttributeError } from './errors';
import { resolveGrouping } from './entityTable';
import {
  getCategoricalColor,
  getContinuousColor,
  normalizeValue,
  valueRange,
} from './palettes';
import { keyedRecord, ownEntry, withEntry } from './records';

const logger = createLogger('Aesthetics');

// ============= Defaults =============

export const DEFAULT_BASE_STYLE: Style = {
  color: '#000000',
  size: 8,
  opacity: 0.9,
  symbol: 'circle',
};

export const DEFAULT_UNSELECTED_STYLE: Style = {
  color: '#cccccc',
  size: 8,
  opacity: 0.3,
  symbol: 'circle',
};

export interface StyleDefaults {
  base: Style;
  unselected: Style;
  continuousPalette: ContinuousPalette;
  categoricalPalette: CategoricalPalette;
}

export const DEFAULT_STYLE_DEFAULTS: StyleDefaults = {
  base: DEFAULT_BASE_STYLE,
  unselected: DEFAULT_UNSELECTED_STYLE,
  continuousPalette: 'viridis',
  categoricalPalette: 'plotly',
};

export function emptyOverrides(): AestheticOverrides {
  return { groups: {}, entities: {} };
}

// ============= Grouping Helpers =============

/**
 * Key under which a group value is stored; null means "no group"
 */
export function groupKey(value: AttributeValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

/**
 * Distinct group keys of a categorical attribute, in order of first
 * appearance. Keys first seen at the same position sort lexicographically.
 */
export function orderGroupKeys(table: EntityTable, attribute: string): string[] {
  const firstSeen = new Map<string, number>();
  table.entities.forEach((entity, index) => {
    const key = groupKey(entity.attributes[attribute]);
    if (key !== null && !firstSeen.has(key)) {
      firstSeen.set(key, index);
    }
  });
  return [...firstSeen.entries()]
    .sort(([keyA, a], [keyB, b]) => a - b || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0))
    .map(([key]) => key);
}

function definedFields(override: StyleOverride | undefined): StyleOverride {
  const result: StyleOverride = {};
  if (!override) return result;
  if (override.color !== undefined) result.color = override.color;
  if (override.size !== undefined) result.size = override.size;
  if (override.opacity !== undefined) result.opacity = override.opacity;
  if (override.symbol !== undefined) result.symbol = override.symbol;
  return result;
}

function applyOverride(style: Style, override: StyleOverride | undefined): Style {
  return { ...style, ...definedFields(override) };
}

// ============= Defaults & Merge =============

/**
 * Compute default aesthetics for a grouping attribute.
 *
 * Categorical groupings cycle through the categorical palette in order of
 * first appearance; continuous groupings map onto the continuous palette
 * normalized to the observed min/max. Unknown attributes disable grouping.
 */
export function computeDefaults(
  table: EntityTable,
  grouping: string | null,
  defaults: StyleDefaults = DEFAULT_STYLE_DEFAULTS
): AestheticsTable {
  const { value: meta } = resolveGrouping(table, grouping);
  const base = { ...defaults.base };
  const unselected = { ...defaults.unselected };

  if (meta === null) {
    const entities = Object.fromEntries(table.entities.map((e): [string, Style] => [e.id, { ...base }]));
    return { grouping: null, groupingKind: 'none', base, unselected, groups: {}, entities, membership: {} };
  }

  const entities: [string, Style][] = [];
  const membership: [string, string][] = [];

  if (meta.kind === 'continuous') {
    const values = table.entities
      .map(e => e.attributes[meta.name])
      .filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
    const range = valueRange(values) ?? { min: 0, max: 0 };

    for (const entity of table.entities) {
      const value = entity.attributes[meta.name];
      if (typeof value === 'number' && Number.isFinite(value)) {
        const t = normalizeValue(value, range.min, range.max);
        entities.push([entity.id, { ...base, color: getContinuousColor(t, defaults.continuousPalette) }]);
        membership.push([entity.id, String(value)]);
      } else {
        entities.push([entity.id, { ...base }]);
      }
    }
    return {
      grouping: meta.name,
      groupingKind: 'continuous',
      colorscale: defaults.continuousPalette,
      range,
      base,
      unselected,
      groups: {},
      entities: Object.fromEntries(entities),
      membership: Object.fromEntries(membership),
    };
  }

  const groups = new Map(
    orderGroupKeys(table, meta.name).map((key, i): [string, Style] => [
      key,
      { ...base, color: getCategoricalColor(i, defaults.categoricalPalette) },
    ])
  );
  for (const entity of table.entities) {
    const key = groupKey(entity.attributes[meta.name]);
    const style = key !== null ? groups.get(key) : undefined;
    if (key !== null && style) {
      membership.push([entity.id, key]);
      entities.push([entity.id, { ...style }]);
    } else {
      entities.push([entity.id, { ...base }]);
    }
  }
  return {
    grouping: meta.name,
    groupingKind: 'categorical',
    base,
    unselected,
    groups: Object.fromEntries(groups),
    entities: Object.fromEntries(entities),
    membership: Object.fromEntries(membership),
  };
}

/**
 * Layer overrides onto computed defaults. Every style field falls back
 * through the precedence chain on its own, so an entity override that only
 * sets `size` keeps the group's color.
 */
export function mergeOverrides(
  defaults: AestheticsTable,
  overrides: AestheticOverrides
): AestheticsTable {
  const groupOverrides = defaults.grouping !== null
    ? ownEntry(overrides.groups, defaults.grouping) ?? {}
    : {};

  const groups = Object.entries(defaults.groups).map(([key, style]): [string, Style] => [
    key,
    applyOverride(style, ownEntry(groupOverrides, key)),
  ]);

  const entities = Object.entries(defaults.entities).map(([id, style]): [string, Style] => {
    const key = ownEntry(defaults.membership, id);
    const grouped = key !== undefined ? applyOverride(style, ownEntry(groupOverrides, key)) : style;
    return [id, applyOverride(grouped, ownEntry(overrides.entities, id))];
  });

  return {
    ...defaults,
    unselected: applyOverride(defaults.unselected, overrides.unselected),
    groups: Object.fromEntries(groups),
    entities: Object.fromEntries(entities),
    membership: { ...defaults.membership },
  };
}

// ============= Persistence =============

const SymbolSchema = z.enum([
  'circle', 'square', 'diamond', 'cross', 'x', 'triangle-up', 'triangle-down', 'star',
]);

export const StyleSchema = z.object({
  color: z.string().min(1),
  size: z.number().finite().nonnegative(),
  opacity: z.number().min(0).max(1),
  symbol: SymbolSchema,
});

export const StyleOverrideSchema = StyleSchema.partial();

export const ContinuousPaletteSchema = z.enum([
  'viridis', 'plasma', 'inferno', 'cividis', 'blue_red',
  'coolwarm', 'spectral', 'blues', 'greens', 'turbo',
]);

export const CategoricalPaletteSchema = z.enum([
  'plotly', 'default', 'tableau10', 'set1', 'set2', 'paired',
]);

export const AestheticsDocumentSchema = z.object({
  version: z.literal(1).default(1),
  kind: z.literal('aesthetics-table'),
  table: z.object({
    grouping: z.string().nullable(),
    groupingKind: z.enum(['none', 'categorical', 'continuous']),
    colorscale: ContinuousPaletteSchema.optional(),
    range: z.object({ min: z.number(), max: z.number() }).optional(),
    base: StyleSchema,
    unselected: StyleSchema,
    groups: keyedRecord(StyleSchema),
    entities: keyedRecord(StyleSchema),
    membership: keyedRecord(z.string()).default({}),
  }),
});

export const OverridesDocumentSchema = z.object({
  version: z.literal(1).default(1),
  kind: z.literal('aesthetics-overrides'),
  grouping: z.string().nullable().optional(),
  groups: keyedRecord(keyedRecord(StyleOverrideSchema)).default({}),
  entities: keyedRecord(StyleOverrideSchema).default({}),
  unselected: StyleOverrideSchema.optional(),
});

export type AestheticsDocument = z.infer<typeof AestheticsDocumentSchema>;
export type OverridesDocument = z.infer<typeof OverridesDocumentSchema>;

function parseBlob(blob: unknown): unknown {
  if (typeof blob !== 'string') return blob;
  try {
    return JSON.parse(blob);
  } catch (e) {
    throw new AestheticsFormatError(`Aesthetics document is not valid JSON: ${String(e)}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Serialize a resolved aesthetics table to its persisted JSON form.
 */
export function serialize(table: AestheticsTable): string {
  const document: AestheticsDocument = { version: 1, kind: 'aesthetics-table', table };
  return JSON.stringify(document);
}

/**
 * Restore an aesthetics table. Accepts the JSON string or the parsed
 * object; fields the schema does not know are dropped.
 *
 * @throws AestheticsFormatError when required fields are missing or invalid
 */
export function deserialize(blob: unknown): AestheticsTable {
  const result = AestheticsDocumentSchema.safeParse(parseBlob(blob));
  if (!result.success) {
    throw new AestheticsFormatError(`Invalid aesthetics document: ${describeIssues(result.error)}`);
  }
  const { table } = result.data;
  return {
    grouping: table.grouping,
    groupingKind: table.groupingKind,
    ...(table.colorscale !== undefined ? { colorscale: table.colorscale } : {}),
    ...(table.range !== undefined ? { range: table.range } : {}),
    base: table.base,
    unselected: table.unselected,
    groups: table.groups,
    entities: table.entities,
    membership: table.membership,
  };
}

function compactOverride(override: StyleOverride): StyleOverride | null {
  const fields = definedFields(override);
  return Object.keys(fields).length > 0 ? fields : null;
}

function compactRecord(record: Record<string, StyleOverride>): Record<string, StyleOverride> {
  return Object.fromEntries(
    Object.entries(record).flatMap(([key, override]): [string, StyleOverride][] => {
      const compact = compactOverride(override);
      return compact ? [[key, compact]] : [];
    })
  );
}

export function serializeOverrides(overrides: AestheticOverrides, grouping: string | null): string {
  const document: OverridesDocument = {
    version: 1,
    kind: 'aesthetics-overrides',
    grouping,
    groups: Object.fromEntries(
      Object.entries(overrides.groups).map(([attribute, values]): [string, Record<string, StyleOverride>] => [
        attribute,
        compactRecord(values),
      ])
    ),
    entities: compactRecord(overrides.entities),
    ...(overrides.unselected ? { unselected: definedFields(overrides.unselected) } : {}),
  };
  return JSON.stringify(document);
}

// Per-field maps keyed by group value, as written by earlier dashboard versions:
// { "<attribute>": { "color": { "default": "#000", "<value>": "#f00" }, "size": {...} } }
const LegacyFieldMapSchema = keyedRecord(z.union([z.string(), z.number()]));
const LegacyGroupSchema = z.object({
  color: LegacyFieldMapSchema.optional(),
  size: LegacyFieldMapSchema.optional(),
  opacity: LegacyFieldMapSchema.optional(),
  symbol: LegacyFieldMapSchema.optional(),
});
const LegacyDocumentSchema = z.record(LegacyGroupSchema);

const RESERVED_LEGACY_KEYS = new Set(['default', 'unselected', 'colorscale']);

function legacyToOverrides(legacy: z.infer<typeof LegacyDocumentSchema>): AestheticOverrides {
  const groups: [string, Record<string, StyleOverride>][] = [];
  for (const [attribute, fields] of Object.entries(legacy)) {
    const values = new Map<string, StyleOverride>();
    const ensure = (key: string): StyleOverride => {
      const existing = values.get(key);
      if (existing) return existing;
      const created: StyleOverride = {};
      values.set(key, created);
      return created;
    };

    for (const [key, color] of Object.entries(fields.color ?? {})) {
      if (!RESERVED_LEGACY_KEYS.has(key) && typeof color === 'string') ensure(key).color = color;
    }
    for (const [key, size] of Object.entries(fields.size ?? {})) {
      const n = Number(size);
      if (!RESERVED_LEGACY_KEYS.has(key) && Number.isFinite(n)) ensure(key).size = n;
    }
    for (const [key, opacity] of Object.entries(fields.opacity ?? {})) {
      const n = Number(opacity);
      if (!RESERVED_LEGACY_KEYS.has(key) && n >= 0 && n <= 1) ensure(key).opacity = n;
    }
    for (const [key, symbol] of Object.entries(fields.symbol ?? {})) {
      const parsed = SymbolSchema.safeParse(symbol);
      if (!RESERVED_LEGACY_KEYS.has(key) && parsed.success) ensure(key).symbol = parsed.data;
    }
    if (values.size > 0) groups.push([attribute, Object.fromEntries(values)]);
  }
  return { groups: Object.fromEntries(groups), entities: {} };
}

/**
 * Restore overrides from an exported document, or from the older per-field
 * aesthetics file layout.
 *
 * @throws AestheticsFormatError when neither layout matches
 */
export function deserializeOverrides(blob: unknown): AestheticOverrides {
  const parsed = parseBlob(blob);
  const result = OverridesDocumentSchema.safeParse(parsed);
  if (result.success) {
    const { groups, entities, unselected } = result.data;
    return { groups, entities, ...(unselected ? { unselected } : {}) };
  }

  const legacy = LegacyDocumentSchema.safeParse(parsed);
  if (legacy.success && Object.keys(legacy.data).length > 0) {
    logger.info('Reading aesthetics overrides from the per-field layout');
    return legacyToOverrides(legacy.data);
  }

  throw new AestheticsFormatError(`Invalid aesthetics overrides: ${describeIssues(result.error)}`);
}

// ============= Legends =============

/**
 * Whether a figure should show its legend (or color bar).
 */
export function shouldShowLegend(aesthetics: AestheticsTable, legendEnabled: boolean): boolean {
  switch (aesthetics.groupingKind) {
    case 'none':
      return false;
    case 'continuous':
      return legendEnabled;
    case 'categorical':
      return legendEnabled && Object.keys(aesthetics.groups).length > 1;
  }
}

/**
 * Shorten labels to `maxLength` characters while keeping them unique.
 * Characters other than letters, digits and spaces are removed, spaces
 * become underscores, and repeats get a numeric suffix ("Eur", "Eur1").
 * A `maxLength` of 0 leaves labels untouched.
 */
export function abbreviateLabels(labels: readonly string[], maxLength: number): string[] {
  if (maxLength <= 0) return [...labels];

  const counter = new Map<string, number>();
  return labels.map(label => {
    const cleaned = label.replace(/[^a-zA-Z0-9 ]/g, '');
    const abbr = cleaned.slice(0, maxLength).replace(/ /g, '_').replace(/_+$/, '');
    let candidate = abbr;
    while (counter.has(candidate)) {
      const next = (counter.get(abbr) ?? 0) + 1;
      counter.set(abbr, next);
      candidate = `${abbr}${next}`;
    }
    counter.set(candidate, 0);
    return candidate;
  });
}

// ============= Manager =============

export interface AestheticsManagerOptions {
  grouping: string | null;
  defaults?: StyleDefaults;
  overrides?: AestheticOverrides;
}

/**
 * Per-session aesthetics state: the active grouping, the overrides, and the
 * resolved table (recomputed lazily after any change).
 */
export class AestheticsManager {
  private readonly table: EntityTable;
  private readonly defaults: StyleDefaults;
  private grouping: string | null;
  private overrides: AestheticOverrides;
  private computedDefaults: AestheticsTable | null = null;
  private resolved: AestheticsTable | null = null;

  constructor(table: EntityTable, options: AestheticsManagerOptions) {
    this.table = table;
    this.defaults = options.defaults ?? DEFAULT_STYLE_DEFAULTS;
    this.grouping = resolveGrouping(table, options.grouping).value?.name ?? null;
    this.overrides = options.overrides ?? emptyOverrides();
  }

  getGrouping(): string | null {
    return this.grouping;
  }

  /**
   * Switch the grouping attribute. Unknown attributes disable grouping and
   * are reported back; overrides are kept either way.
   */
  setGrouping(grouping: string | null): UnknownAttributeError[] {
    const { value, errors } = resolveGrouping(this.table, grouping);
    const next = value?.name ?? null;
    if (next !== this.grouping) {
      this.grouping = next;
      this.computedDefaults = null;
      this.invalidate();
    }
    return errors;
  }

  getOverrides(): AestheticOverrides {
    return structuredClone(this.overrides);
  }

  setEntityOverride(id: string, override: StyleOverride | null): void {
    const compact = override ? compactOverride(override) : null;
    this.overrides = { ...this.overrides, entities: withEntry(this.overrides.entities, id, compact) };
    this.invalidate();
  }

  /**
   * Override the style of one group value of the active grouping.
   */
  setGroupOverride(value: string, override: StyleOverride | null): void {
    if (this.grouping === null) {
      logger.warn('No active grouping, group override ignored');
      return;
    }
    const compact = override ? compactOverride(override) : null;
    const forGrouping = withEntry(ownEntry(this.overrides.groups, this.grouping) ?? {}, value, compact);
    this.overrides = {
      ...this.overrides,
      groups: withEntry(this.overrides.groups, this.grouping, forGrouping),
    };
    this.invalidate();
  }

  setUnselectedOverride(override: StyleOverride | null): void {
    const compact = override ? compactOverride(override) : null;
    const next: AestheticOverrides = { groups: this.overrides.groups, entities: this.overrides.entities };
    if (compact) next.unselected = compact;
    this.overrides = next;
    this.invalidate();
  }

  clearOverrides(): void {
    this.overrides = emptyOverrides();
    this.invalidate();
  }

  /** Resolved aesthetics for the active grouping */
  current(): AestheticsTable {
    if (!this.resolved) {
      this.computedDefaults ??= computeDefaults(this.table, this.grouping, this.defaults);
      this.resolved = mergeOverrides(this.computedDefaults, this.overrides);
    }
    return this.resolved;
  }

  exportOverrides(): string {
    return serializeOverrides(this.overrides, this.grouping);
  }

  /**
   * Replace overrides from a saved document. On failure the current
   * overrides stay in place and the error propagates.
   */
  importOverrides(blob: unknown): void {
    this.overrides = deserializeOverrides(blob);
    this.invalidate();
  }

  private invalidate(): void {
    this.resolved = null;
  }
}
