/**
 * PCA scatter view (2D or 3D)
 *
 * 2D figures carry selection as `selectedPoints` per trace, so a new
 * selection is a cheap restyle. 3D markers have no selected/unselected
 * styling: unselected points move to their own trace and every selection
 * change is a rebuild.
 */

import type {
  AestheticsTable,
  Entity,
  EntityTable,
  Figure,
  Selection,
  TraceSpec,
} from '@/types/dashboard';
import { groupKey, shouldShowLegend } from '../aesthetics';
import { boundsFromRanges, isPointInBox, isPointInPolygon, type Point } from './geometry';
import {
  hoverTexts,
  markerFor,
  partitionByGroup,
  reselectTraces,
  selectedIndices,
  unselectedMarkerFor,
  type HoverParams,
} from './traces';
import {
  buildCacheKey,
  type Availability,
  type FigureRequest,
  type HighlightPatch,
  type ViewAdapter,
} from './types';

/** Above this many points the 2D view asks for the WebGL renderer */
export const DEFAULT_WEBGL_THRESHOLD = 3000;

export const UNSELECTED_TRACE = 'Unselected';

export interface ScatterParams extends HoverParams {
  /** Resolved axis names, two or three depending on `dimensions` */
  axes: readonly string[];
  dimensions: 2 | 3;
  showLegend: boolean;
  /** Legend label length, 0 keeps labels whole */
  labelLength: number;
  webglThreshold: number;
}

export type ScatterEvent =
  /** Polygon in the coordinates of the first two axes */
  | { type: 'lasso'; polygon: Point[] }
  | { type: 'box'; x: [number, number]; y: [number, number] }
  | { type: 'click'; ids: string[] }
  /** Legend click on a group; a null value picks the entities without one */
  | { type: 'legend'; attribute: string; value: string | null };

function axisIndices(table: EntityTable, params: ScatterParams): number[] {
  return params.axes.slice(0, params.dimensions).map(axis => table.axisNames.indexOf(axis));
}

function coordinate(entity: Entity, index: number): number | undefined {
  const value = index >= 0 ? entity.coords[index] : undefined;
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

function visibleEntities(table: EntityTable, params: ScatterParams): Entity[] {
  const indices = axisIndices(table, params);
  if (indices.length < params.dimensions) return [];
  return table.entities.filter(entity => indices.every(i => coordinate(entity, i) !== undefined));
}

function column(entities: readonly Entity[], index: number): number[] {
  return entities.map(entity => coordinate(entity, index) ?? Number.NaN);
}

function render2d(
  table: EntityTable,
  selection: Selection,
  aesthetics: AestheticsTable,
  params: ScatterParams
): Figure {
  const [xi, yi] = axisIndices(table, params);
  const entities = visibleEntities(table, params);
  const byId = new Map(entities.map(e => [e.id, e]));
  const legend = shouldShowLegend(aesthetics, params.showLegend);
  const renderer = entities.length > params.webglThreshold ? 'webgl' : 'svg';

  const traces: TraceSpec[] = partitionByGroup(entities.map(e => e.id), aesthetics, params.labelLength)
    .map(group => {
      const members = group.ids.flatMap(id => byId.get(id) ?? []);
      const marker = markerFor(group.ids, aesthetics);
      if (aesthetics.groupingKind === 'continuous') marker.showScale = legend;
      const trace: TraceSpec = {
        name: group.name,
        type: 'scatter',
        ids: group.ids,
        x: column(members, xi),
        y: column(members, yi),
        text: hoverTexts(members, table, aesthetics, params),
        marker,
        unselectedMarker: unselectedMarkerFor(aesthetics),
        showLegend: legend && aesthetics.groupingKind === 'categorical',
        renderer,
      };
      const selectedPoints = selectedIndices(group.ids, selection.ids);
      if (selectedPoints) trace.selectedPoints = selectedPoints;
      return trace;
    });

  return {
    view: 'scatter',
    traces,
    layout: {
      xTitle: params.axes[0],
      yTitle: params.axes[1],
      ...(aesthetics.grouping !== null ? { legendTitle: aesthetics.grouping } : {}),
      showLegend: legend,
    },
    annotations: entities.length === 0 ? ['No data to display'] : [],
  };
}

function render3d(
  table: EntityTable,
  selection: Selection,
  aesthetics: AestheticsTable,
  params: ScatterParams
): Figure {
  const [xi, yi, zi] = axisIndices(table, params);
  const entities = visibleEntities(table, params);
  const legend = shouldShowLegend(aesthetics, params.showLegend);

  // With nothing selected every point keeps its own style
  const hasSelection = selection.ids.size > 0;
  const selected = hasSelection ? entities.filter(e => selection.ids.has(e.id)) : entities;
  const unselected = hasSelection ? entities.filter(e => !selection.ids.has(e.id)) : [];
  const byId = new Map(selected.map(e => [e.id, e]));

  const traces: TraceSpec[] = [];
  if (unselected.length > 0) {
    const { color, size, opacity, symbol } = aesthetics.unselected;
    traces.push({
      name: UNSELECTED_TRACE,
      type: 'scatter3d',
      ids: unselected.map(e => e.id),
      x: column(unselected, xi),
      y: column(unselected, yi),
      z: column(unselected, zi),
      text: hoverTexts(unselected, table, aesthetics, params),
      marker: { color, size, opacity, symbol },
      showLegend: false,
    });
  }

  for (const group of partitionByGroup(selected.map(e => e.id), aesthetics, params.labelLength)) {
    const members = group.ids.flatMap(id => byId.get(id) ?? []);
    const marker = markerFor(group.ids, aesthetics);
    if (aesthetics.groupingKind === 'continuous') marker.showScale = legend;
    traces.push({
      name: group.name,
      type: 'scatter3d',
      ids: group.ids,
      x: column(members, xi),
      y: column(members, yi),
      z: column(members, zi),
      text: hoverTexts(members, table, aesthetics, params),
      marker,
      showLegend: legend && aesthetics.groupingKind === 'categorical',
    });
  }

  return {
    view: 'scatter',
    traces,
    layout: {
      xTitle: params.axes[0],
      yTitle: params.axes[1],
      zTitle: params.axes[2],
      ...(aesthetics.grouping !== null ? { legendTitle: aesthetics.grouping } : {}),
      showLegend: legend,
    },
    annotations: entities.length === 0 ? ['No data to display'] : [],
  };
}

export const scatterAdapter: ViewAdapter<ScatterEvent, ScatterParams> = {
  kind: 'scatter',

  isAvailable(table: EntityTable): Availability {
    if (table.axisNames.length < 2) {
      return { available: false, reason: 'At least two principal components are required' };
    }
    return { available: true };
  },

  visibleIds(table, params) {
    return visibleEntities(table, params).map(e => e.id);
  },

  toSelection(event, table, params) {
    const entities = visibleEntities(table, params);
    const [xi, yi] = axisIndices(table, params);
    const position = (entity: Entity): Point => ({
      x: coordinate(entity, xi) ?? Number.NaN,
      y: coordinate(entity, yi) ?? Number.NaN,
    });

    switch (event.type) {
      case 'lasso':
        return new Set(
          entities.filter(e => isPointInPolygon(position(e), event.polygon)).map(e => e.id)
        );
      case 'box': {
        const bounds = boundsFromRanges(event.x, event.y);
        return new Set(entities.filter(e => isPointInBox(position(e), bounds)).map(e => e.id));
      }
      case 'click': {
        const wanted = new Set(event.ids);
        return new Set(entities.filter(e => wanted.has(e.id)).map(e => e.id));
      }
      case 'legend':
        return new Set(
          entities
            .filter(e => groupKey(e.attributes[event.attribute]) === event.value)
            .map(e => e.id)
        );
    }
  },

  cacheKey(table, selection, aesthetics, params) {
    return buildCacheKey(
      'scatter',
      {
        axes: params.axes.slice(0, params.dimensions),
        dimensions: params.dimensions,
        showLegend: params.showLegend,
        labelLength: params.labelLength,
        webglThreshold: params.webglThreshold,
        hoverDetailed: params.hoverDetailed,
        hoverColumns: params.hoverColumns,
      },
      table,
      selection,
      aesthetics
    );
  },

  render(table, selection, aesthetics, params): FigureRequest {
    const key = this.cacheKey(table, selection, aesthetics, params);
    const figure = params.dimensions === 3
      ? render3d(table, selection, aesthetics, params)
      : render2d(table, selection, aesthetics, params);
    return { key, figure };
  },

  highlight(figure: Figure, selection: Selection): HighlightPatch | null {
    if (figure.traces.some(trace => trace.type === 'scatter3d')) {
      return null;
    }
    return { traces: reselectTraces(figure.traces, selection.ids) };
  },
};
