/**
 * Geographic view. Only entities with coordinates are drawn or selectable.
 */

import type { AestheticsTable, Entity, EntityTable, Figure, TraceSpec } from '@/types/dashboard';
import { shouldShowLegend } from '../aesthetics';
import { countWithGeo } from '../entityTable';
import { toMapSymbol } from '../palettes';
import { boundsFromRanges, isPointInBox, isPointInPolygon } from './geometry';
import {
  hoverTexts,
  markerFor,
  partitionByGroup,
  reselectTraces,
  selectedIndices,
  type HoverParams,
} from './traces';
import { buildCacheKey, type Availability, type ViewAdapter } from './types';

export const NO_GEO_MESSAGE = 'No valid geographic coordinates found';

export interface MapParams extends HoverParams {
  showLegend: boolean;
  labelLength: number;
}

export interface GeoVertex {
  lat: number;
  lon: number;
}

export type MapEvent =
  | { type: 'box'; lat: [number, number]; lon: [number, number] }
  | { type: 'lasso'; polygon: GeoVertex[] }
  | { type: 'click'; ids: string[] };

type GeoEntity = Entity & { geo: NonNullable<Entity['geo']> };

function hasGeo(entity: Entity): entity is GeoEntity {
  return entity.geo !== undefined;
}

function geoEntities(table: EntityTable): GeoEntity[] {
  return table.entities.filter(hasGeo);
}

function renderMap(
  table: EntityTable,
  selected: ReadonlySet<string>,
  aesthetics: AestheticsTable,
  params: MapParams
): Figure {
  const entities = geoEntities(table);
  const byId = new Map(entities.map(e => [e.id, e]));
  const legend = shouldShowLegend(aesthetics, params.showLegend);

  const traces: TraceSpec[] = partitionByGroup(entities.map(e => e.id), aesthetics, params.labelLength)
    .map(group => {
      const members = group.ids.flatMap(id => byId.get(id) ?? []);
      const marker = markerFor(group.ids, aesthetics, toMapSymbol);
      if (aesthetics.groupingKind === 'continuous') marker.showScale = legend;
      const trace: TraceSpec = {
        name: group.name,
        type: 'scattermap',
        ids: group.ids,
        lat: members.map(e => e.geo.lat),
        lon: members.map(e => e.geo.lon),
        text: hoverTexts(members, table, aesthetics, params),
        marker,
        // Map markers cannot recolor unselected points, only fade them
        unselectedMarker: {
          color: aesthetics.base.color,
          size: aesthetics.unselected.size,
          opacity: aesthetics.unselected.opacity,
        },
        showLegend: legend && aesthetics.groupingKind === 'categorical',
      };
      const selectedPoints = selectedIndices(group.ids, selected);
      if (selectedPoints) trace.selectedPoints = selectedPoints;
      return trace;
    });

  const missing = table.entities.length - entities.length;
  const annotations = entities.length === 0
    ? [NO_GEO_MESSAGE]
    : missing > 0
      ? [`${missing} of ${table.entities.length} samples have no coordinates`]
      : [];

  return {
    view: 'map',
    traces,
    layout: {
      ...(aesthetics.grouping !== null ? { legendTitle: aesthetics.grouping } : {}),
      showLegend: legend,
    },
    annotations,
  };
}

export const mapAdapter: ViewAdapter<MapEvent, MapParams> = {
  kind: 'map',

  isAvailable(table: EntityTable): Availability {
    return countWithGeo(table) > 0
      ? { available: true }
      : { available: false, reason: NO_GEO_MESSAGE };
  },

  visibleIds(table) {
    return geoEntities(table).map(e => e.id);
  },

  toSelection(event, table) {
    const entities = geoEntities(table);
    switch (event.type) {
      case 'box': {
        const bounds = boundsFromRanges(event.lon, event.lat);
        return new Set(
          entities
            .filter(e => isPointInBox({ x: e.geo.lon, y: e.geo.lat }, bounds))
            .map(e => e.id)
        );
      }
      case 'lasso': {
        const polygon = event.polygon.map(v => ({ x: v.lon, y: v.lat }));
        return new Set(
          entities
            .filter(e => isPointInPolygon({ x: e.geo.lon, y: e.geo.lat }, polygon))
            .map(e => e.id)
        );
      }
      case 'click': {
        const wanted = new Set(event.ids);
        return new Set(entities.filter(e => wanted.has(e.id)).map(e => e.id));
      }
    }
  },

  cacheKey(table, selection, aesthetics, params) {
    return buildCacheKey(
      'map',
      {
        showLegend: params.showLegend,
        labelLength: params.labelLength,
        hoverDetailed: params.hoverDetailed,
        hoverColumns: params.hoverColumns,
      },
      table,
      selection,
      aesthetics
    );
  },

  render(table, selection, aesthetics, params) {
    return {
      key: this.cacheKey(table, selection, aesthetics, params),
      figure: renderMap(table, selection.ids, aesthetics, params),
    };
  },

  highlight(figure, selection) {
    return { traces: reselectTraces(figure.traces, selection.ids) };
  },
};
