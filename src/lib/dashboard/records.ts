/**
 * Records keyed by data: entity ids and group values.
 *
 * Any string is a valid id, "__proto__" included, so these records are only
 * ever written through Object.fromEntries (own data properties) and read
 * through `ownEntry`. Plain assignment on a fresh object literal would set
 * its prototype instead.
 */

import { z } from 'zod';

/** Own entry of a record; inherited properties never count */
export function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Copy of `record` with `key` set, or removed when `value` is null.
 * Existing keys keep their position.
 */
export function withEntry<T>(
  record: Readonly<Record<string, T>>,
  key: string,
  value: T | null
): Record<string, T> {
  const entries = Object.entries(record).filter(([k]) => k !== key || value !== null);
  const existing = entries.findIndex(([k]) => k === key);
  if (value !== null) {
    if (existing >= 0) entries[existing] = [key, value];
    else entries.push([key, value]);
  }
  return Object.fromEntries(entries);
}

const PlainObjectSchema = z.custom<object>(
  raw => typeof raw === 'object' && raw !== null && !Array.isArray(raw),
  { message: 'Expected an object' }
);

/**
 * Zod record for data-keyed maps. `z.record` skips a "__proto__" key while
 * parsing; validating the entries keeps every key.
 */
export function keyedRecord<Out>(value: z.ZodType<Out, z.ZodTypeDef, unknown>) {
  return PlainObjectSchema
    .transform((raw): [string, unknown][] => Object.entries(raw))
    .pipe(z.array(z.tuple([z.string(), value])))
    .transform((entries): Record<string, Out> => Object.fromEntries(entries));
}
