/**
 * Time view: a jittered strip plot or a histogram of sample times.
 *
 * Histogram bins are computed here rather than by the renderer so that
 * range selections and the selected overlay agree on bin edges.
 */

import type {
  AestheticsTable,
  Entity,
  EntityTable,
  Figure,
  HistogramBin,
  TraceSpec,
} from '@/types/dashboard';
import { countWithTime } from '../entityTable';
import { unitHash } from '../hashing';
import { valueRange } from '../palettes';
import { isPointInPolygon, type Point } from './geometry';
import {
  hoverTexts,
  markerFor,
  partitionByGroup,
  reselectTraces,
  selectedIndices,
  unselectedMarkerFor,
  type HoverParams,
} from './traces';
import { buildCacheKey, type Availability, type HighlightPatch, type ViewAdapter } from './types';

export const TIME_PLOTS = ['scatter', 'histogram', 'histogram-simple'] as const;
export type TimePlot = (typeof TIME_PLOTS)[number];

export const DEFAULT_BIN_COUNT = 100;
export const NO_TIME_MESSAGE = 'No time values found';

const ALL_TRACE = 'All';
const SIMPLE_TRACE = 'All samples';
const ALL_COLOR = 'lightgray';
const SELECTED_COLOR = '#1f77b4';
const JITTER_SPREAD = 0.6;

export interface TimeParams extends HoverParams {
  plot: TimePlot;
  nbins: number;
  /** Reverse the time axis (e.g. years before present) */
  invert: boolean;
  axisLabel: string;
  labelLength: number;
}

export type TimeEvent =
  /** Inclusive time range */
  | { type: 'range'; min: number; max: number }
  /** Polygon in (time, jitter) coordinates of the strip plot */
  | { type: 'lasso'; polygon: Point[] }
  | { type: 'click'; ids: string[] };

type TimedEntity = Entity & { time: number };

function hasTime(entity: Entity): entity is TimedEntity {
  return entity.time !== undefined;
}

function timedEntities(table: EntityTable): TimedEntity[] {
  return table.entities.filter(hasTime);
}

/** Vertical offset of a sample in the strip plot, stable per id */
export function jitter(id: string): number {
  return (unitHash(id) - 0.5) * JITTER_SPREAD;
}

/**
 * Equal-width bins over the observed range. The last bin is closed on the
 * right; a constant series gives a single zero-width bin.
 */
export function computeBins(
  points: readonly { id: string; time: number }[],
  nbins: number
): HistogramBin[] {
  const range = valueRange(points.map(p => p.time));
  if (!range) return [];
  const { min, max } = range;

  if (min === max) {
    return [{ start: min, end: max, count: points.length, ids: points.map(p => p.id) }];
  }

  const count = Math.max(1, Math.floor(nbins));
  const width = (max - min) / count;
  const bins: HistogramBin[] = Array.from({ length: count }, (_, i) => ({
    start: min + i * width,
    end: i === count - 1 ? max : min + (i + 1) * width,
    count: 0,
    ids: [],
  }));
  for (const point of points) {
    const index = Math.min(Math.floor((point.time - min) / width), count - 1);
    bins[index].ids.push(point.id);
    bins[index].count += 1;
  }
  return bins;
}

function restrictBins(bins: readonly HistogramBin[], selected: ReadonlySet<string>): HistogramBin[] {
  return bins.map(bin => {
    const ids = bin.ids.filter(id => selected.has(id));
    return { start: bin.start, end: bin.end, count: ids.length, ids };
  });
}

/**
 * Selected overlay of the histogram: a trace over the selected samples and
 * the matching bin counts. Nothing when the selection is empty.
 */
function histogramOverlay(
  all: TraceSpec,
  bins: readonly HistogramBin[],
  selected: ReadonlySet<string>
): Pick<HighlightPatch, 'traces' | 'selectedBins'> {
  if (selected.size === 0) {
    return { traces: [all] };
  }
  const x = all.x ?? [];
  const ids: string[] = [];
  const times: number[] = [];
  all.ids.forEach((id, i) => {
    if (selected.has(id)) {
      ids.push(id);
      times.push(x[i]);
    }
  });
  const overlay: TraceSpec = {
    name: 'Selected',
    type: 'histogram',
    ids,
    x: times,
    marker: { color: SELECTED_COLOR, opacity: 0.9 },
    showLegend: false,
  };
  return { traces: [all, overlay], selectedBins: restrictBins(bins, selected) };
}

function renderStrip(
  table: EntityTable,
  entities: readonly TimedEntity[],
  selected: ReadonlySet<string>,
  aesthetics: AestheticsTable,
  params: TimeParams
): TraceSpec[] {
  const byId = new Map(entities.map(e => [e.id, e]));
  return partitionByGroup(entities.map(e => e.id), aesthetics, params.labelLength).map(group => {
    const members = group.ids.flatMap(id => byId.get(id) ?? []);
    const marker = markerFor(group.ids, aesthetics);
    if (aesthetics.groupingKind === 'continuous') marker.showScale = false;
    const trace: TraceSpec = {
      name: group.name,
      type: 'scatter',
      ids: group.ids,
      x: members.map(e => e.time),
      y: members.map(e => jitter(e.id)),
      text: hoverTexts(members, table, aesthetics, params),
      marker,
      unselectedMarker: unselectedMarkerFor(aesthetics),
      showLegend: false,
    };
    const selectedPoints = selectedIndices(group.ids, selected);
    if (selectedPoints) trace.selectedPoints = selectedPoints;
    return trace;
  });
}

function renderTime(
  table: EntityTable,
  selected: ReadonlySet<string>,
  aesthetics: AestheticsTable,
  params: TimeParams
): Figure {
  const entities = timedEntities(table);
  const layout = {
    xTitle: params.axisLabel,
    showLegend: false,
    ...(params.invert ? { invertX: true } : {}),
  };
  const annotations = entities.length === 0 ? [NO_TIME_MESSAGE] : [];

  if (params.plot === 'scatter') {
    return { view: 'time', traces: renderStrip(table, entities, selected, aesthetics, params), layout, annotations };
  }

  const bins = computeBins(entities, params.nbins);
  const histogramLayout = { ...layout, yTitle: 'Count' };
  const simple = params.plot === 'histogram-simple';
  const all: TraceSpec = {
    name: simple ? SIMPLE_TRACE : ALL_TRACE,
    type: 'histogram',
    ids: entities.map(e => e.id),
    x: entities.map(e => e.time),
    marker: simple ? { color: SELECTED_COLOR, opacity: 1 } : { color: ALL_COLOR, opacity: 0.6 },
    showLegend: false,
  };

  if (simple) {
    return { view: 'time', traces: [all], layout: histogramLayout, annotations, bins };
  }

  const overlay = histogramOverlay(all, bins, selected);
  return {
    view: 'time',
    traces: overlay.traces ?? [all],
    layout: histogramLayout,
    annotations,
    bins,
    ...(overlay.selectedBins ? { selectedBins: overlay.selectedBins } : {}),
  };
}

export const timeAdapter: ViewAdapter<TimeEvent, TimeParams> = {
  kind: 'time',

  isAvailable(table: EntityTable): Availability {
    return countWithTime(table) > 0
      ? { available: true }
      : { available: false, reason: NO_TIME_MESSAGE };
  },

  visibleIds(table) {
    return timedEntities(table).map(e => e.id);
  },

  toSelection(event, table) {
    const entities = timedEntities(table);
    switch (event.type) {
      case 'range': {
        const low = Math.min(event.min, event.max);
        const high = Math.max(event.min, event.max);
        return new Set(entities.filter(e => e.time >= low && e.time <= high).map(e => e.id));
      }
      case 'lasso':
        return new Set(
          entities
            .filter(e => isPointInPolygon({ x: e.time, y: jitter(e.id) }, event.polygon))
            .map(e => e.id)
        );
      case 'click': {
        const wanted = new Set(event.ids);
        return new Set(entities.filter(e => wanted.has(e.id)).map(e => e.id));
      }
    }
  },

  cacheKey(table, selection, aesthetics, params) {
    return buildCacheKey(
      'time',
      {
        plot: params.plot,
        nbins: params.nbins,
        invert: params.invert,
        axisLabel: params.axisLabel,
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
      figure: renderTime(table, selection.ids, aesthetics, params),
    };
  },

  highlight(figure, selection) {
    const all = figure.traces[0];
    if (!all || all.type !== 'histogram') {
      return { traces: reselectTraces(figure.traces, selection.ids) };
    }
    // The simple histogram ignores selection
    if (all.name !== ALL_TRACE || !figure.bins) {
      return {};
    }
    const overlay = histogramOverlay(all, figure.bins, selection.ids);
    return { traces: overlay.traces, selectedBins: overlay.selectedBins };
  },
};
