/**
 * Entity table construction and lookups
 *
 * Validates the loader's output with Zod, enforces id uniqueness (the one
 * fatal data condition), infers attribute kinds, and indexes entities by id.
 * The resulting table is frozen and shared read-only by every view.
 */

import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import type {
  AttributeKind,
  AttributeMeta,
  AttributeValue,
  Entity,
  EntityTable,
  GeoPoint,
} from '@/types/dashboard';
import { DataStructureError, UnknownAttributeError } from './errors';
import { fingerprintEntities } from './hashing';

const logger = createLogger('EntityTable');

// ============= Input Schemas =============

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const EntityInputSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  coords: z.array(z.number()).optional(),
  attributes: z.record(AttributeValueSchema).optional(),
  geo: z
    .object({ lat: z.number(), lon: z.number() })
    .nullable()
    .optional(),
  time: z.number().nullable().optional(),
});

export const EntityTableInputSchema = z.object({
  entities: z.array(EntityInputSchema),
  attributes: z
    .array(z.object({ name: z.string().min(1), kind: z.enum(['categorical', 'continuous']) }))
    .optional(),
  axisNames: z.array(z.string().min(1)).optional(),
});

export type EntityInput = z.input<typeof EntityInputSchema>;
export type EntityTableInput = z.input<typeof EntityTableInputSchema>;

// ============= Helpers =============

/**
 * Find the longest series of names sharing a prefix and a consecutive
 * numeric suffix, e.g. ['PC1', 'PC2', 'PC3'] among annotation columns.
 * Returns the names ordered by suffix; the first prefix seen wins ties.
 */
export function findAxisSeries(names: readonly string[]): string[] {
  const pattern = /^([A-Za-z_]+)(\d+)$/;
  const prefixes = new Map<string, number[]>();

  for (const name of names) {
    const match = pattern.exec(name);
    if (!match) continue;
    const [, prefix, digits] = match;
    const numbers = prefixes.get(prefix) ?? [];
    numbers.push(Number(digits));
    prefixes.set(prefix, numbers);
  }

  let longest: string[] = [];
  for (const [prefix, numbers] of prefixes) {
    const sorted = [...numbers].sort((a, b) => a - b);
    const consecutive = sorted.every((n, i) => i === 0 || n === sorted[i - 1] + 1);
    if (consecutive && sorted.length > longest.length) {
      longest = sorted.map(n => `${prefix}${n}`);
    }
  }
  return longest;
}

/**
 * An attribute is continuous when every non-null value is a finite number.
 * Columns with no values at all are treated as categorical.
 */
export function inferAttributeKind(values: readonly AttributeValue[]): AttributeKind {
  const present = values.filter(v => v !== null);
  if (present.length === 0) return 'categorical';
  return present.every(v => typeof v === 'number' && Number.isFinite(v))
    ? 'continuous'
    : 'categorical';
}

function isValidGeo(geo: GeoPoint): boolean {
  return (
    Number.isFinite(geo.lat) &&
    Number.isFinite(geo.lon) &&
    Math.abs(geo.lat) <= 90 &&
    Math.abs(geo.lon) <= 180
  );
}

// ============= Table =============

class IndexedEntityTable implements EntityTable {
  readonly entities: readonly Entity[];
  readonly attributes: readonly AttributeMeta[];
  readonly axisNames: readonly string[];
  readonly fingerprint: string;
  private readonly index: ReadonlyMap<string, number>;
  private readonly attributeIndex: ReadonlyMap<string, AttributeMeta>;

  constructor(entities: Entity[], attributes: AttributeMeta[], axisNames: string[]) {
    this.entities = Object.freeze(entities);
    this.attributes = Object.freeze(attributes);
    this.axisNames = Object.freeze(axisNames);
    this.index = new Map(entities.map((e, i) => [e.id, i]));
    this.attributeIndex = new Map(attributes.map(a => [a.name, a]));
    this.fingerprint = fingerprintEntities(entities);
  }

  indexOf(id: string): number | undefined {
    return this.index.get(id);
  }

  get(id: string): Entity | undefined {
    const i = this.index.get(id);
    return i === undefined ? undefined : this.entities[i];
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  attribute(name: string): AttributeMeta | undefined {
    return this.attributeIndex.get(name);
  }
}

/**
 * Validate and index a loaded table.
 *
 * @throws DataStructureError when the input is malformed, ids repeat, or
 *   coordinate vectors disagree in length
 */
export function buildEntityTable(input: unknown): EntityTable {
  const parsed = EntityTableInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new DataStructureError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  const { entities: rawEntities, attributes: declared, axisNames: declaredAxes } = parsed.data;

  const issues: string[] = [];
  const seen = new Set<string>();
  for (const raw of rawEntities) {
    if (seen.has(raw.id)) {
      issues.push(`duplicate entity id "${raw.id}"`);
    }
    seen.add(raw.id);
  }

  // Coordinates may arrive as PC-like annotation columns instead of vectors
  const attributeOrder: string[] = [];
  const attributeSeen = new Set<string>();
  for (const raw of rawEntities) {
    for (const name of Object.keys(raw.attributes ?? {})) {
      if (!attributeSeen.has(name)) {
        attributeSeen.add(name);
        attributeOrder.push(name);
      }
    }
  }

  const hasCoordVectors = rawEntities.some(e => e.coords !== undefined);
  const axisColumns = hasCoordVectors ? [] : findAxisSeries(attributeOrder);
  const axisColumnSet = new Set(axisColumns);

  const entities: Entity[] = rawEntities.map(raw => {
    const attributes: Record<string, AttributeValue> = {};
    const coordsFromColumns: number[] = [];
    for (const [name, value] of Object.entries(raw.attributes ?? {})) {
      if (axisColumnSet.has(name)) continue;
      attributes[name] = value;
    }
    for (const column of axisColumns) {
      const value = raw.attributes?.[column];
      coordsFromColumns.push(typeof value === 'number' ? value : Number.NaN);
    }

    let geo: GeoPoint | undefined;
    if (raw.geo) {
      if (isValidGeo(raw.geo)) {
        geo = Object.freeze({ lat: raw.geo.lat, lon: raw.geo.lon });
      } else {
        logger.warn(`Ignoring out-of-range coordinates for "${raw.id}"`);
      }
    }

    const entity: Entity = {
      id: raw.id,
      coords: Object.freeze(hasCoordVectors ? [...(raw.coords ?? [])] : coordsFromColumns),
      attributes: Object.freeze(attributes),
      ...(geo ? { geo } : {}),
      ...(raw.time !== undefined && raw.time !== null && Number.isFinite(raw.time)
        ? { time: raw.time }
        : {}),
    };
    return Object.freeze(entity);
  });

  const dimension = entities[0]?.coords.length ?? 0;
  entities.forEach(entity => {
    if (entity.coords.length !== dimension) {
      issues.push(
        `entity "${entity.id}" has ${entity.coords.length} coordinates, expected ${dimension}`
      );
    }
  });

  let axisNames: string[];
  if (declaredAxes) {
    if (declaredAxes.length !== dimension) {
      issues.push(`${declaredAxes.length} axis names for ${dimension} coordinates`);
    }
    if (new Set(declaredAxes).size !== declaredAxes.length) {
      issues.push('axis names must be unique');
    }
    axisNames = [...declaredAxes];
  } else if (axisColumns.length > 0) {
    axisNames = axisColumns;
  } else {
    axisNames = Array.from({ length: dimension }, (_, i) => `PC${i + 1}`);
  }

  if (issues.length > 0) {
    logger.error('Refusing entity table:', issues);
    throw new DataStructureError(issues);
  }

  const declaredKinds = new Map((declared ?? []).map(a => [a.name, a.kind]));
  const attributes: AttributeMeta[] = attributeOrder
    .filter(name => !axisColumnSet.has(name))
    .map(name => ({
      name,
      kind:
        declaredKinds.get(name) ??
        inferAttributeKind(entities.map(e => e.attributes[name] ?? null)),
    }));

  const table = new IndexedEntityTable(entities, attributes, axisNames);
  logger.info(
    `Loaded ${entities.length} entities, ${attributes.length} attributes, ${axisNames.length} axes`
  );
  return table;
}

// ============= Capabilities =============

export function countWithGeo(table: EntityTable): number {
  return table.entities.reduce((n, e) => (e.geo ? n + 1 : n), 0);
}

export function countWithTime(table: EntityTable): number {
  return table.entities.reduce((n, e) => (e.time !== undefined ? n + 1 : n), 0);
}

// ============= Attribute Resolution =============

export interface Resolved<T> {
  value: T;
  errors: UnknownAttributeError[];
}

/**
 * Resolve requested axes against the table. Unknown names fall back to the
 * first axis not already in use (or the first axis when all are used).
 */
export function resolveAxes(
  table: EntityTable,
  requested: readonly string[],
  count: number
): Resolved<string[]> {
  const available = table.axisNames;
  const errors: UnknownAttributeError[] = [];
  const axes: string[] = [];

  if (available.length === 0) {
    return { value: [], errors };
  }

  for (let i = 0; i < count; i++) {
    const name = requested[i];
    if (name !== undefined && available.includes(name)) {
      axes.push(name);
      continue;
    }
    const fallback = available.find(a => !axes.includes(a) && !requested.includes(a)) ?? available[0];
    if (name !== undefined) {
      errors.push(new UnknownAttributeError(name, fallback));
      logger.warn(`Unknown axis "${name}", using "${fallback}"`);
    }
    axes.push(fallback);
  }
  return { value: axes, errors };
}

/**
 * Resolve a grouping attribute. `null` and `'none'` mean no grouping;
 * unknown names fall back to no grouping.
 */
export function resolveGrouping(
  table: EntityTable,
  requested: string | null
): Resolved<AttributeMeta | null> {
  if (requested === null || requested === 'none') {
    return { value: null, errors: [] };
  }
  const meta = table.attribute(requested);
  if (meta) {
    return { value: meta, errors: [] };
  }
  logger.warn(`Unknown grouping attribute "${requested}", grouping disabled`);
  return { value: null, errors: [new UnknownAttributeError(requested, null)] };
}

/**
 * Keep the requested table columns that exist, preserving order.
 */
export function resolveColumns(
  table: EntityTable,
  requested: readonly string[]
): Resolved<string[]> {
  const errors: UnknownAttributeError[] = [];
  const columns: string[] = [];
  for (const name of requested) {
    if (name === 'id') continue;
    if (table.attribute(name)) {
      if (!columns.includes(name)) columns.push(name);
    } else {
      errors.push(new UnknownAttributeError(name, null));
    }
  }
  return { value: columns, errors };
}
