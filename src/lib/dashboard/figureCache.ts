/**
 * Figure Cache - memoizes figure construction per view
 *
 * Keys are value objects built from content fingerprints, so a new entity
 * table or a changed aesthetics table simply produces different keys and old
 * entries age out of the LRU. Nothing is purged explicitly.
 */

import { createLogger } from '@/lib/logger';
import type { Figure, ViewKind } from '@/types/dashboard';
import { stableStringify } from './hashing';

const logger = createLogger('FigureCache');

export const DEFAULT_CACHE_CAPACITY = 32;

// ============= Cache Key =============

export type ParamValue = string | number | boolean | null | readonly ParamValue[];

/** View parameters that shape a figure: axes, dimensionality, view options */
export type CacheParams = Readonly<Record<string, ParamValue>>;

export interface CacheKeyFields {
  view: ViewKind;
  params: CacheParams;
  grouping: string | null;
  aestheticsFingerprint: string;
  dataFingerprint: string;
  selectionFingerprint: string;
}

export class CacheKey implements Readonly<CacheKeyFields> {
  readonly view: ViewKind;
  readonly params: CacheParams;
  readonly grouping: string | null;
  readonly aestheticsFingerprint: string;
  readonly dataFingerprint: string;
  readonly selectionFingerprint: string;
  private readonly structural: string;
  private readonly serialized: string;

  constructor(fields: CacheKeyFields) {
    this.view = fields.view;
    this.params = Object.freeze({ ...fields.params });
    this.grouping = fields.grouping;
    this.aestheticsFingerprint = fields.aestheticsFingerprint;
    this.dataFingerprint = fields.dataFingerprint;
    this.selectionFingerprint = fields.selectionFingerprint;
    this.structural = [
      this.view,
      stableStringify(this.params),
      this.grouping ?? '-',
      this.aestheticsFingerprint,
      this.dataFingerprint,
    ].join('|');
    this.serialized = `${this.structural}|${this.selectionFingerprint}`;
    Object.freeze(this);
  }

  /** Everything but the selection: equal structural keys share geometry */
  structuralKey(): string {
    return this.structural;
  }

  toString(): string {
    return this.serialized;
  }

  equals(other: CacheKey): boolean {
    return this.serialized === other.serialized;
  }
}

// ============= Cache =============

export interface CacheEntry {
  key: CacheKey;
  figure: Figure;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  corruptions: number;
  size: number;
  capacity: number;
}

/**
 * Bounded least-recently-used figure store. Map iteration order is
 * insertion order, so the first entry is always the least recently used.
 */
export class FigureCache {
  private readonly capacity: number;
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private corruptions = 0;

  constructor(capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up a figure. An entry that does not match the requested key is
   * discarded and reported as a miss.
   */
  get(key: CacheKey): Figure | undefined {
    const id = key.toString();
    const entry = this.entries.get(id);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (!entry.key.equals(key) || entry.figure.view !== key.view) {
      this.entries.delete(id);
      this.corruptions += 1;
      this.misses += 1;
      logger.warn(`Discarding mismatched entry for ${key.view} (${id})`);
      return undefined;
    }
    // Refresh recency
    this.entries.delete(id);
    this.entries.set(id, entry);
    this.hits += 1;
    return entry.figure;
  }

  put(key: CacheKey, figure: Figure): void {
    const id = key.toString();
    this.entries.delete(id);
    this.entries.set(id, { key, figure });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions += 1;
    }
  }

  /**
   * Return the cached figure for `key`, building and storing it on a miss.
   */
  getOrBuild(key: CacheKey, build: () => Figure): { figure: Figure; hit: boolean } {
    const cached = this.get(key);
    if (cached) {
      return { figure: cached, hit: true };
    }
    const figure = build();
    this.put(key, figure);
    logger.debug(`Built ${key.view} figure`);
    return { figure, hit: false };
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      corruptions: this.corruptions,
      size: this.entries.size,
      capacity: this.capacity,
    };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.corruptions = 0;
  }
}
