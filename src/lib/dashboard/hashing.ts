/**
 * Hashing utilities for stable cache keys
 *
 * Content fingerprints for the entity table, the aesthetics table and the
 * selection. Identical content always yields the same fingerprint, whatever
 * the key order of the objects involved.
 */

import type { AestheticsTable, Entity } from '@/types/dashboard';

/**
 * Simple string hash function (djb2 algorithm)
 */
function djb2Hash(str: string): number {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) | 0;
  }
  return hash >>> 0;
}

/**
 * Second, independent string hash (sdbm) to widen the fingerprint
 */
function sdbmHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (str.charCodeAt(i) + (hash << 6) + (hash << 16) - hash) | 0;
  }
  return hash >>> 0;
}

/**
 * Hash a string to a 16-hex-digit fingerprint
 */
export function hashString(str: string): string {
  return (
    djb2Hash(str).toString(16).padStart(8, '0') +
    sdbmHash(str).toString(16).padStart(8, '0')
  );
}

/**
 * Map a string to a number in [0, 1), the same one every time
 */
export function unitHash(str: string): number {
  return djb2Hash(str) / 0x100000000;
}

/**
 * Stable JSON stringify with sorted keys, applied recursively.
 * `undefined` object members are skipped, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(v => (v === undefined ? 'null' : stableStringify(v))).join(',')}]`;
  }
  if (value instanceof Set) {
    return stableStringify([...value].map(String).sort());
  }
  const parts: string[] = [];
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, member] of entries) {
    if (member === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${stableStringify(member)}`);
  }
  return `{${parts.join(',')}}`;
}

/**
 * Hash any JSON-like value
 */
export function hashValue(value: unknown): string {
  return hashString(stableStringify(value));
}

function entityToken(entity: Entity): string {
  return stableStringify({
    id: entity.id,
    coords: entity.coords,
    attributes: entity.attributes,
    geo: entity.geo,
    time: entity.time,
  });
}

/**
 * Fingerprint of a list of entities. Order-sensitive: the table adapter
 * renders rows in input order, so reordering is a content change.
 */
export function fingerprintEntities(entities: readonly Entity[]): string {
  return `${entities.length}:${hashString(entities.map(entityToken).join('\n'))}`;
}

const aestheticsFingerprints = new WeakMap<AestheticsTable, string>();

/**
 * Fingerprint of resolved aesthetics (includes every override's effect).
 * Memoized per table object; resolved tables are never mutated.
 */
export function fingerprintAesthetics(table: AestheticsTable): string {
  let fingerprint = aestheticsFingerprints.get(table);
  if (fingerprint === undefined) {
    fingerprint = hashValue(table);
    aestheticsFingerprints.set(table, fingerprint);
  }
  return fingerprint;
}

/**
 * Fingerprint of a set of selected ids, independent of insertion order.
 * The empty selection has a fixed, readable fingerprint.
 */
export function fingerprintSelection(ids: ReadonlySet<string>): string {
  if (ids.size === 0) return 'none';
  return `${ids.size}:${hashString([...ids].sort().join('\u0000'))}`;
}
