/**
 * Entity Table Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildEntityTable,
  countWithGeo,
  countWithTime,
  findAxisSeries,
  inferAttributeKind,
  resolveAxes,
  resolveColumns,
  resolveGrouping,
} from '../entityTable';
import { DataStructureError, UnknownAttributeError } from '../errors';
import { samplesTable } from './fixtures';

// ============= Construction =============

describe('buildEntityTable', () => {
  it('should index entities and infer attribute kinds', () => {
    const table = samplesTable();

    expect(table.entities.map(e => e.id)).toEqual(['S1', 'S2', 'S3', 'S4', 'S5']);
    expect(table.indexOf('S3')).toBe(2);
    expect(table.get('S2')?.coords).toEqual([1, 1, 1]);
    expect(table.has('S9')).toBe(false);
    expect(table.attributes).toEqual([
      { name: 'region', kind: 'categorical' },
      { name: 'year', kind: 'continuous' },
      { name: 'ok', kind: 'categorical' },
    ]);
    expect(table.axisNames).toEqual(['PC1', 'PC2', 'PC3']);
  });

  it('should stringify numeric ids', () => {
    const table = buildEntityTable({ entities: [{ id: 7, coords: [1] }] });
    expect(table.has('7')).toBe(true);
  });

  it('should name axes PC1..PCn when none are declared', () => {
    const table = buildEntityTable({ entities: [{ id: 'a', coords: [1, 2] }] });
    expect(table.axisNames).toEqual(['PC1', 'PC2']);
  });

  it('should read coordinates from PC-like attribute columns', () => {
    const table = buildEntityTable({
      entities: [
        { id: 'a', attributes: { PC1: 0.5, PC2: -1, site: 'x' } },
        { id: 'b', attributes: { PC1: 1.5, PC2: 2, site: 'y' } },
      ],
    });

    expect(table.axisNames).toEqual(['PC1', 'PC2']);
    expect(table.get('b')?.coords).toEqual([1.5, 2]);
    expect(table.attributes).toEqual([{ name: 'site', kind: 'categorical' }]);
  });

  it('should keep declared attribute kinds', () => {
    const table = buildEntityTable({
      entities: [{ id: 'a', coords: [1], attributes: { batch: 3 } }],
      attributes: [{ name: 'batch', kind: 'categorical' }],
    });
    expect(table.attribute('batch')?.kind).toBe('categorical');
  });

  it('should drop out-of-range geographic coordinates', () => {
    const table = buildEntityTable({
      entities: [
        { id: 'a', coords: [1], geo: { lat: 100, lon: 0 } },
        { id: 'b', coords: [1], geo: { lat: 45, lon: 7 } },
      ],
    });
    expect(table.get('a')?.geo).toBeUndefined();
    expect(table.get('b')?.geo).toEqual({ lat: 45, lon: 7 });
  });

  it('should reject duplicate ids', () => {
    expect(() =>
      buildEntityTable({ entities: [{ id: 'A', coords: [1] }, { id: 'A', coords: [2] }] })
    ).toThrow('Invalid entity table: duplicate entity id "A"');
  });

  it('should reject coordinate vectors of different lengths', () => {
    try {
      buildEntityTable({ entities: [{ id: 'a', coords: [1, 2] }, { id: 'b', coords: [1] }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DataStructureError);
      if (error instanceof DataStructureError) {
        expect(error.code).toBe('DATA_STRUCTURE');
        expect(error.issues).toEqual(['entity "b" has 1 coordinates, expected 2']);
      }
    }
  });

  it('should reject axis names that do not match the dimension', () => {
    expect(() =>
      buildEntityTable({ entities: [{ id: 'a', coords: [1, 2] }], axisNames: ['PC1'] })
    ).toThrow('1 axis names for 2 coordinates');
  });

  it('should reject input that does not match the schema', () => {
    expect(() => buildEntityTable({ entities: 'nope' })).toThrow(DataStructureError);
  });

  it('should fingerprint content', () => {
    expect(samplesTable().fingerprint).toBe(samplesTable().fingerprint);
    const other = buildEntityTable({ entities: [{ id: 'S1', coords: [0, 0, 0] }] });
    expect(other.fingerprint).not.toBe(samplesTable().fingerprint);
  });
});

// ============= Helpers =============

describe('findAxisSeries', () => {
  it('should order a consecutive series by suffix', () => {
    expect(findAxisSeries(['PC1', 'PC3', 'PC2', 'site'])).toEqual(['PC1', 'PC2', 'PC3']);
  });

  it('should ignore series with gaps', () => {
    expect(findAxisSeries(['PC1', 'PC3'])).toEqual([]);
  });
});

describe('inferAttributeKind', () => {
  it('should treat finite numbers as continuous', () => {
    expect(inferAttributeKind([1, 2.5, null])).toBe('continuous');
  });

  it('should treat mixed or empty columns as categorical', () => {
    expect(inferAttributeKind([1, 'a'])).toBe('categorical');
    expect(inferAttributeKind([null, null])).toBe('categorical');
  });
});

describe('capabilities', () => {
  it('should count entities with geo points and times', () => {
    const table = samplesTable();
    expect(countWithGeo(table)).toBe(4);
    expect(countWithTime(table)).toBe(4);
  });
});

// ============= Resolution =============

describe('resolveAxes', () => {
  it('should fall back to the first free axis for unknown names', () => {
    const { value, errors } = resolveAxes(samplesTable(), ['PC3', 'bogus'], 2);

    expect(value).toEqual(['PC3', 'PC1']);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Unknown attribute "bogus", using "PC1"');
  });

  it('should fill missing requests without errors', () => {
    expect(resolveAxes(samplesTable(), [], 3)).toEqual({ value: ['PC1', 'PC2', 'PC3'], errors: [] });
  });
});

describe('resolveGrouping', () => {
  it('should treat none as no grouping', () => {
    expect(resolveGrouping(samplesTable(), 'none')).toEqual({ value: null, errors: [] });
  });

  it('should disable grouping for unknown attributes', () => {
    const { value, errors } = resolveGrouping(samplesTable(), 'country');
    expect(value).toBeNull();
    expect(errors[0]).toBeInstanceOf(UnknownAttributeError);
    expect(errors[0].fallback).toBeNull();
  });
});

describe('resolveColumns', () => {
  it('should keep known columns once and skip id', () => {
    const { value, errors } = resolveColumns(samplesTable(), ['id', 'year', 'nope', 'year']);
    expect(value).toEqual(['year']);
    expect(errors.map(e => e.attribute)).toEqual(['nope']);
  });
});
