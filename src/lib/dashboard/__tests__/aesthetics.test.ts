/**
 * Aesthetics Unit Tests
 *
 * Default computation, override precedence, persistence and legends.
 */

import { describe, it, expect } from 'vitest';
import {
  AestheticsManager,
  abbreviateLabels,
  computeDefaults,
  deserialize,
  deserializeOverrides,
  mergeOverrides,
  serialize,
  serializeOverrides,
  shouldShowLegend,
} from '../aesthetics';
import { buildEntityTable } from '../entityTable';
import { AestheticsFormatError } from '../errors';
import { fingerprintAesthetics } from '../hashing';
import { samplesTable } from './fixtures';

// ============= Defaults =============

describe('computeDefaults', () => {
  it('should give every entity the base style without grouping', () => {
    const table = computeDefaults(samplesTable(), null);

    expect(table.groupingKind).toBe('none');
    expect(table.entities.S3).toEqual({ color: '#000000', size: 8, opacity: 0.9, symbol: 'circle' });
    expect(table.groups).toEqual({});
  });

  it('should cycle the categorical palette in order of first appearance', () => {
    const table = computeDefaults(samplesTable(), 'region');

    expect(table.groupingKind).toBe('categorical');
    expect(Object.keys(table.groups)).toEqual(['North', 'South']);
    expect(table.groups.North.color).toBe('#636efa');
    expect(table.groups.South.color).toBe('#ef553b');
    expect(table.entities.S4.color).toBe('#ef553b');
    expect(table.membership.S5).toBe('North');
  });

  it('should map continuous values onto the color scale', () => {
    const table = computeDefaults(samplesTable(), 'year');

    expect(table.groupingKind).toBe('continuous');
    expect(table.colorscale).toBe('viridis');
    expect(table.range).toEqual({ min: 2019, max: 2022 });
    expect(table.entities.S1.color).toBe('hsl(270, 70%, 25%)');
    expect(table.entities.S5.color).toBe('hsl(60, 50%, 70%)');
    // S4 has no year
    expect(table.entities.S4.color).toBe('#000000');
    expect(table.membership.S4).toBeUndefined();
  });

  it('should key boolean groups by their string form', () => {
    const table = computeDefaults(samplesTable(), 'ok');
    expect(Object.keys(table.groups)).toEqual(['true', 'false']);
  });

  it('should disable grouping for unknown attributes', () => {
    expect(computeDefaults(samplesTable(), 'country').groupingKind).toBe('none');
  });
});

// ============= Overrides =============

describe('mergeOverrides', () => {
  it('should resolve each field through entity, group, then default', () => {
    const defaults = computeDefaults(samplesTable(), 'region');
    const merged = mergeOverrides(defaults, {
      groups: { region: { North: { color: '#111111', size: 10 } } },
      entities: { S1: { size: 20 } },
    });

    expect(merged.entities.S1).toEqual({ color: '#111111', size: 20, opacity: 0.9, symbol: 'circle' });
    expect(merged.entities.S2).toEqual({ color: '#111111', size: 10, opacity: 0.9, symbol: 'circle' });
    expect(merged.entities.S3.color).toBe('#ef553b');
    expect(merged.groups.North.color).toBe('#111111');
  });

  it('should ignore group overrides of another grouping', () => {
    const defaults = computeDefaults(samplesTable(), 'ok');
    const merged = mergeOverrides(defaults, {
      groups: { region: { North: { color: '#111111' } } },
      entities: {},
    });
    expect(merged.entities.S1.color).toBe('#636efa');
  });

  it('should apply the unselected override', () => {
    const defaults = computeDefaults(samplesTable(), null);
    const merged = mergeOverrides(defaults, { groups: {}, entities: {}, unselected: { opacity: 0.1 } });
    expect(merged.unselected).toEqual({ color: '#cccccc', size: 8, opacity: 0.1, symbol: 'circle' });
  });
});

describe('AestheticsManager', () => {
  it('should keep overrides across grouping changes', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: 'region' });
    manager.setGroupOverride('North', { color: '#111111' });
    manager.setEntityOverride('S3', { symbol: 'star' });

    manager.setGrouping('year');
    expect(manager.current().entities.S1.color).toBe('hsl(270, 70%, 25%)');
    expect(manager.current().entities.S3.symbol).toBe('star');

    manager.setGrouping('region');
    expect(manager.current().entities.S1.color).toBe('#111111');
  });

  it('should report unknown groupings and disable grouping', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: 'region' });
    const errors = manager.setGrouping('country');

    expect(errors.map(e => e.message)).toEqual(['Unknown attribute "country"']);
    expect(manager.getGrouping()).toBeNull();
  });

  it('should ignore group overrides without a grouping', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: null });
    manager.setGroupOverride('North', { color: '#111111' });
    expect(manager.getOverrides()).toEqual({ groups: {}, entities: {} });
  });

  it('should remove an override set to null', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: null });
    manager.setEntityOverride('S1', { size: 3 });
    manager.setEntityOverride('S1', null);
    expect(manager.getOverrides().entities).toEqual({});
  });

  it('should reuse the resolved table until something changes', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: 'region' });
    const first = manager.current();

    expect(manager.current()).toBe(first);
    manager.setUnselectedOverride({ color: '#eeeeee' });
    const changed = manager.current();
    expect(changed).not.toBe(first);
    expect(fingerprintAesthetics(changed)).not.toBe(fingerprintAesthetics(first));
    manager.setUnselectedOverride(null);
    expect(fingerprintAesthetics(manager.current())).toBe(fingerprintAesthetics(first));
  });

  it('should keep current overrides when an import fails', () => {
    const manager = new AestheticsManager(samplesTable(), { grouping: null });
    manager.setEntityOverride('S1', { size: 3 });

    expect(() => manager.importOverrides('not json')).toThrow(AestheticsFormatError);
    expect(manager.getOverrides().entities).toEqual({ S1: { size: 3 } });
  });

  it('should restore exported overrides', () => {
    const source = new AestheticsManager(samplesTable(), { grouping: 'region' });
    source.setGroupOverride('South', { opacity: 0.5 });
    source.setEntityOverride('S2', { color: '#123456' });

    const target = new AestheticsManager(samplesTable(), { grouping: 'region' });
    target.importOverrides(source.exportOverrides());

    expect(target.current()).toEqual(source.current());
  });
});

// ============= Persistence =============

describe('serialize / deserialize', () => {
  it('should restore a continuous table', () => {
    const table = computeDefaults(samplesTable(), 'year');
    expect(deserialize(serialize(table))).toEqual(table);
  });

  it('should accept a parsed document', () => {
    const table = computeDefaults(samplesTable(), 'region');
    expect(deserialize(JSON.parse(serialize(table)))).toEqual(table);
  });

  it('should reject documents with missing fields', () => {
    expect(() => deserialize({ kind: 'aesthetics-table', table: { grouping: null } })).toThrow(
      AestheticsFormatError
    );
  });
});

describe('deserializeOverrides', () => {
  it('should drop empty overrides when serializing', () => {
    const text = serializeOverrides({ groups: { region: { North: {} } }, entities: { S1: { size: 4 } } }, 'region');
    expect(JSON.parse(text)).toEqual({
      version: 1,
      kind: 'aesthetics-overrides',
      grouping: 'region',
      groups: { region: {} },
      entities: { S1: { size: 4 } },
    });
  });

  it('should read the per-field layout', () => {
    const overrides = deserializeOverrides({
      region: {
        color: { default: '#000000', North: '#ff0000' },
        size: { South: '12' },
        symbol: { North: 'hexagon' },
      },
    });

    expect(overrides).toEqual({
      groups: { region: { North: { color: '#ff0000' }, South: { size: 12 } } },
      entities: {},
    });
  });

  it('should reject unrelated documents', () => {
    expect(() => deserializeOverrides({ kind: 'something-else' })).toThrow(AestheticsFormatError);
  });
});

// ============= Data-keyed records =============

describe('ids and group values named "__proto__"', () => {
  const odd = buildEntityTable({
    entities: [
      { id: '__proto__', coords: [0, 0], attributes: { g: 'a' } },
      { id: 'B', coords: [1, 1], attributes: { g: '__proto__' } },
    ],
  });

  it('should be ordinary keys of the computed table', () => {
    const table = computeDefaults(odd, 'g');

    expect(Object.keys(table.entities)).toEqual(['__proto__', 'B']);
    expect(Object.keys(table.groups)).toEqual(['a', '__proto__']);
    expect(Object.entries(table.membership)).toEqual([
      ['__proto__', 'a'],
      ['B', '__proto__'],
    ]);
    expect(Object.getPrototypeOf(table.entities)).toBe(Object.prototype);
  });

  it('should survive serialization', () => {
    const table = computeDefaults(odd, 'g');
    const restored = deserialize(serialize(table));

    expect(Object.keys(restored.entities)).toEqual(['__proto__', 'B']);
    expect(Object.keys(restored.groups)).toEqual(['a', '__proto__']);
    expect(restored).toEqual(table);
  });

  it('should take overrides and carry them through export', () => {
    const manager = new AestheticsManager(odd, { grouping: 'g' });
    manager.setEntityOverride('__proto__', { opacity: 0.5 });
    manager.setGroupOverride('__proto__', { size: 3 });

    expect(Object.entries(manager.current().entities)).toEqual([
      ['__proto__', { color: '#636efa', size: 8, opacity: 0.5, symbol: 'circle' }],
      ['B', { color: '#ef553b', size: 3, opacity: 0.9, symbol: 'circle' }],
    ]);

    const target = new AestheticsManager(odd, { grouping: 'g' });
    target.importOverrides(manager.exportOverrides());
    expect(Object.entries(target.getOverrides().entities)).toEqual([['__proto__', { opacity: 0.5 }]]);
    expect(Object.entries(target.getOverrides().groups.g)).toEqual([['__proto__', { size: 3 }]]);
    expect(target.current()).toEqual(manager.current());
  });
});

// ============= Legends =============

describe('shouldShowLegend', () => {
  it('should hide the legend without grouping', () => {
    expect(shouldShowLegend(computeDefaults(samplesTable(), null), true)).toBe(false);
  });

  it('should show a categorical legend with several groups', () => {
    const table = computeDefaults(samplesTable(), 'region');
    expect(shouldShowLegend(table, true)).toBe(true);
    expect(shouldShowLegend(table, false)).toBe(false);
  });

  it('should follow the toggle for continuous groupings', () => {
    const table = computeDefaults(samplesTable(), 'year');
    expect(shouldShowLegend(table, true)).toBe(true);
    expect(shouldShowLegend(table, false)).toBe(false);
  });
});

describe('abbreviateLabels', () => {
  it('should keep shortened labels unique', () => {
    expect(abbreviateLabels(['Europe', 'Europa', 'Asia'], 3)).toEqual(['Eur', 'Eur1', 'Asi']);
  });

  it('should strip punctuation and trailing separators', () => {
    expect(abbreviateLabels(['New York!'], 4)).toEqual(['New']);
  });

  it('should leave labels untouched at length 0', () => {
    expect(abbreviateLabels(['New York!'], 0)).toEqual(['New York!']);
  });
});
