/**
 * Scatter Adapter Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { AestheticsManager, computeDefaults } from '../../aesthetics';
import { buildEntityTable } from '../../entityTable';
import { samplesTable, selectionOf } from '../../__tests__/fixtures';
import { scatterAdapter, type ScatterParams } from '../scatter';
import { applyHighlight } from '../types';

const table = samplesTable();
const regions = computeDefaults(table, 'region');

const PARAMS_2D: ScatterParams = {
  axes: ['PC1', 'PC2'],
  dimensions: 2,
  showLegend: true,
  labelLength: 0,
  webglThreshold: 3000,
  hoverDetailed: false,
  hoverColumns: [],
};

const PARAMS_3D: ScatterParams = { ...PARAMS_2D, axes: ['PC1', 'PC2', 'PC3'], dimensions: 3 };

// ============= Availability =============

describe('scatterAdapter.isAvailable', () => {
  it('should need two axes', () => {
    const flat = buildEntityTable({ entities: [{ id: 'a', coords: [1] }] });
    expect(scatterAdapter.isAvailable(flat)).toEqual({
      available: false,
      reason: 'At least two principal components are required',
    });
    expect(scatterAdapter.isAvailable(table)).toEqual({ available: true });
  });
});

// ============= Rendering =============

describe('scatterAdapter.render (2D)', () => {
  it('should draw one trace per group', () => {
    const { figure } = scatterAdapter.render(table, selectionOf([], 0), regions, PARAMS_2D);

    expect(figure.traces.map(t => t.name)).toEqual(['North', 'South']);
    const [north] = figure.traces;
    expect(north).toEqual({
      name: 'North',
      type: 'scatter',
      ids: ['S1', 'S2', 'S5'],
      x: [0, 1, 4],
      y: [0, 1, 4],
      text: ['ID: S1\nregion: North', 'ID: S2\nregion: North', 'ID: S5\nregion: North'],
      marker: { color: '#636efa', size: 8, opacity: 0.9, symbol: 'circle' },
      unselectedMarker: { color: '#cccccc', size: 8, opacity: 0.3 },
      showLegend: true,
      renderer: 'svg',
    });
    expect(figure.layout).toEqual({ xTitle: 'PC1', yTitle: 'PC2', legendTitle: 'region', showLegend: true });
    expect(figure.annotations).toEqual([]);
  });

  it('should mark selected points per trace', () => {
    const { figure } = scatterAdapter.render(table, selectionOf(['S2', 'S3']), regions, PARAMS_2D);
    expect(figure.traces.map(t => t.selectedPoints)).toEqual([[1], [0]]);
  });

  it('should ask for WebGL above the threshold', () => {
    const { figure } = scatterAdapter.render(table, selectionOf([]), regions, { ...PARAMS_2D, webglThreshold: 3 });
    expect(figure.traces[0].renderer).toBe('webgl');
  });

  it('should show a color bar for continuous groupings', () => {
    const years = computeDefaults(table, 'year');
    const { figure } = scatterAdapter.render(table, selectionOf([]), years, PARAMS_2D);

    expect(figure.traces).toHaveLength(1);
    expect(figure.traces[0].name).toBe('year');
    expect(figure.traces[0].showLegend).toBe(false);
    expect(figure.traces[0].marker?.colorscale).toBe('viridis');
    expect(figure.traces[0].marker?.showScale).toBe(true);
    expect(figure.layout.showLegend).toBe(true);
  });

  it('should hide legend and color bar when the legend is off', () => {
    const years = computeDefaults(table, 'year');
    const { figure } = scatterAdapter.render(table, selectionOf([]), years, { ...PARAMS_2D, showLegend: false });

    expect(figure.traces[0].marker?.showScale).toBe(false);
    expect(figure.layout.showLegend).toBe(false);
  });

  it('should keep per-point styles from entity overrides', () => {
    const manager = new AestheticsManager(table, { grouping: 'region' });
    manager.setEntityOverride('S2', { symbol: 'diamond', size: 12 });
    const { figure } = scatterAdapter.render(table, selectionOf([]), manager.current(), PARAMS_2D);

    expect(figure.traces[0].marker?.symbol).toEqual(['circle', 'diamond', 'circle']);
    expect(figure.traces[0].marker?.size).toEqual([8, 12, 8]);
  });

  it('should skip entities without finite coordinates', () => {
    const partial = buildEntityTable({
      entities: [
        { id: 'a', attributes: { PC1: 1, PC2: 2 } },
        { id: 'b', attributes: { PC1: 3, PC2: 'n/a' } },
      ],
    });
    expect(scatterAdapter.visibleIds(partial, PARAMS_2D)).toEqual(['a']);
  });

  it('should say when nothing can be drawn', () => {
    const empty = buildEntityTable({ entities: [{ id: 'a', attributes: { PC1: 'n/a', PC2: 'n/a' } }] });
    const { figure } = scatterAdapter.render(empty, selectionOf([]), computeDefaults(empty, null), PARAMS_2D);
    expect(figure.annotations).toEqual(['No data to display']);
  });

  it('should list the chosen columns in detailed hover text', () => {
    const params: ScatterParams = { ...PARAMS_2D, hoverDetailed: true, hoverColumns: ['year'] };
    const { figure } = scatterAdapter.render(table, selectionOf([]), regions, params);
    expect(figure.traces[1].text).toEqual(['ID: S3\nregion: South\nyear: 2021', 'ID: S4\nregion: South']);
  });

  it('should group entities whose id or group value is "__proto__"', () => {
    const odd = buildEntityTable({
      entities: [
        { id: '__proto__', coords: [0, 0], attributes: { g: 'a' } },
        { id: 'B', coords: [1, 1], attributes: { g: '__proto__' } },
      ],
    });
    const { figure } = scatterAdapter.render(odd, selectionOf([]), computeDefaults(odd, 'g'), PARAMS_2D);

    expect(figure.traces.map(t => t.name)).toEqual(['a', '__proto__']);
    expect(figure.traces.map(t => t.ids)).toEqual([['__proto__'], ['B']]);
    expect(figure.traces.map(t => t.marker?.color)).toEqual(['#636efa', '#ef553b']);
  });
});

describe('scatterAdapter.render (3D)', () => {
  it('should move unselected points to their own trace', () => {
    const { figure } = scatterAdapter.render(table, selectionOf(['S1']), regions, PARAMS_3D);

    expect(figure.traces.map(t => t.name)).toEqual(['Unselected', 'North']);
    expect(figure.traces[0].ids).toEqual(['S2', 'S3', 'S4', 'S5']);
    expect(figure.traces[0].text?.[0]).toBe('ID: S2\nregion: North');
    expect(figure.traces[0].marker).toEqual({ color: '#cccccc', size: 8, opacity: 0.3, symbol: 'circle' });
    expect(figure.traces[1].z).toEqual([0]);
    expect(figure.layout.zTitle).toBe('PC3');
  });

  it('should keep every style without a selection', () => {
    const { figure } = scatterAdapter.render(table, selectionOf([]), regions, PARAMS_3D);
    expect(figure.traces.map(t => t.name)).toEqual(['North', 'South']);
  });

  it('should not restyle in place', () => {
    const { figure } = scatterAdapter.render(table, selectionOf(['S1']), regions, PARAMS_3D);
    expect(scatterAdapter.highlight(figure, selectionOf(['S2']))).toBeNull();
  });
});

// ============= Highlight =============

describe('scatterAdapter.highlight', () => {
  it('should match a fresh render for the new selection', () => {
    const transitions: [string[], string[]][] = [
      [[], ['S1', 'S4']],
      [['S1', 'S4'], ['S2']],
      [['S2'], []],
    ];
    for (const [from, to] of transitions) {
      const before = scatterAdapter.render(table, selectionOf(from), regions, PARAMS_2D).figure;
      const patch = scatterAdapter.highlight(before, selectionOf(to));
      expect(patch).not.toBeNull();
      if (patch) {
        const expected = scatterAdapter.render(table, selectionOf(to), regions, PARAMS_2D).figure;
        expect(applyHighlight(before, patch)).toEqual(expected);
      }
    }
  });
});

// ============= Interaction =============

describe('scatterAdapter.toSelection', () => {
  it('should select inside a box given in any corner order', () => {
    const ids = scatterAdapter.toSelection({ type: 'box', x: [2.5, 0.5], y: [0.5, 2.5] }, table, PARAMS_2D);
    expect([...ids]).toEqual(['S2', 'S3']);
  });

  it('should select inside a lasso', () => {
    const polygon = [
      { x: -0.5, y: -0.5 },
      { x: 1.5, y: -0.5 },
      { x: 1.5, y: 1.5 },
      { x: -0.5, y: 1.5 },
    ];
    expect([...scatterAdapter.toSelection({ type: 'lasso', polygon }, table, PARAMS_2D)]).toEqual(['S1', 'S2']);
  });

  it('should ignore clicked ids that are not drawn', () => {
    expect([...scatterAdapter.toSelection({ type: 'click', ids: ['S1', 'S9'] }, table, PARAMS_2D)]).toEqual(['S1']);
  });

  it('should select a legend group, or the entities without a value', () => {
    const south = scatterAdapter.toSelection({ type: 'legend', attribute: 'region', value: 'South' }, table, PARAMS_2D);
    const noYear = scatterAdapter.toSelection({ type: 'legend', attribute: 'year', value: null }, table, PARAMS_2D);

    expect([...south]).toEqual(['S3', 'S4']);
    expect([...noYear]).toEqual(['S4']);
  });
});

describe('scatterAdapter.cacheKey', () => {
  it('should ignore axes beyond the active dimensions', () => {
    const selection = selectionOf([]);
    const a = scatterAdapter.cacheKey(table, selection, regions, { ...PARAMS_2D, axes: ['PC1', 'PC2', 'PC3'] });
    expect(a.equals(scatterAdapter.cacheKey(table, selection, regions, PARAMS_2D))).toBe(true);
  });

  it('should share the structural key across selections', () => {
    const a = scatterAdapter.cacheKey(table, selectionOf([]), regions, PARAMS_2D);
    const b = scatterAdapter.cacheKey(table, selectionOf(['S1']), regions, PARAMS_2D);
    expect(a.structuralKey()).toBe(b.structuralKey());
    expect(a.equals(b)).toBe(false);
  });

  it('should change with the hover settings', () => {
    const selection = selectionOf([]);
    const short = scatterAdapter.cacheKey(table, selection, regions, PARAMS_2D);
    const detailed = scatterAdapter.cacheKey(table, selection, regions, { ...PARAMS_2D, hoverDetailed: true });
    const columns = scatterAdapter.cacheKey(table, selection, regions, { ...PARAMS_2D, hoverColumns: ['year'] });

    expect(detailed.equals(short)).toBe(false);
    expect(columns.equals(short)).toBe(false);
  });
});
