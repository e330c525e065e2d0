/**
 * Trace building blocks shared by the point-based views
 */

import type {
  AestheticsTable,
  AttributeValue,
  Entity,
  EntityTable,
  MarkerSpec,
  MarkerSymbol,
  Style,
  TraceSpec,
} from '@/types/dashboard';
import { abbreviateLabels } from '../aesthetics';
import { ownEntry } from '../records';

/** Name of the trace holding entities without a group value */
export const UNGROUPED_TRACE = '(none)';

export interface PointGroup {
  /** Raw group key, null for the ungrouped / single trace */
  key: string | null;
  name: string;
  ids: string[];
}

/**
 * Split ids into one group per categorical value (palette order), followed
 * by the entities without a value. Continuous and absent groupings give a
 * single group.
 */
export function partitionByGroup(
  ids: readonly string[],
  aesthetics: AestheticsTable,
  labelLength = 0
): PointGroup[] {
  if (aesthetics.groupingKind !== 'categorical') {
    return [{ key: null, name: aesthetics.grouping ?? 'All', ids: [...ids] }];
  }

  const keys = Object.keys(aesthetics.groups);
  const buckets = new Map<string, string[]>(keys.map(k => [k, []]));
  const ungrouped: string[] = [];
  for (const id of ids) {
    const key = ownEntry(aesthetics.membership, id);
    const bucket = key === undefined ? undefined : buckets.get(key);
    if (bucket) bucket.push(id);
    else ungrouped.push(id);
  }

  const labels = abbreviateLabels(keys, labelLength);
  const groups: PointGroup[] = keys
    .map((key, i) => ({ key, name: labels[i], ids: buckets.get(key) ?? [] }))
    .filter(group => group.ids.length > 0);
  if (ungrouped.length > 0) {
    groups.push({ key: null, name: UNGROUPED_TRACE, ids: ungrouped });
  }
  return groups;
}

function collapse<T>(values: T[]): T | T[] {
  if (values.length > 0 && values.every(v => v === values[0])) {
    return values[0];
  }
  return values;
}

export function styleOf(id: string, aesthetics: AestheticsTable): Style {
  return ownEntry(aesthetics.entities, id) ?? aesthetics.base;
}

/**
 * Per-point marker built from resolved entity styles. Uniform fields
 * collapse to a single value.
 */
export function markerFor(
  ids: readonly string[],
  aesthetics: AestheticsTable,
  symbolOf: (symbol: MarkerSymbol) => MarkerSymbol = s => s
): MarkerSpec {
  const styles = ids.map(id => styleOf(id, aesthetics));
  const marker: MarkerSpec = {
    color: collapse(styles.map(s => s.color)),
    size: collapse(styles.map(s => s.size)),
    opacity: collapse(styles.map(s => s.opacity)),
    symbol: collapse(styles.map(s => symbolOf(s.symbol))),
  };
  if (aesthetics.groupingKind === 'continuous' && aesthetics.colorscale) {
    marker.colorscale = aesthetics.colorscale;
  }
  return marker;
}

export function unselectedMarkerFor(aesthetics: AestheticsTable): NonNullable<TraceSpec['unselectedMarker']> {
  const { color, size, opacity } = aesthetics.unselected;
  return { color, size, opacity };
}

/**
 * Indices of the selected ids within a trace. An empty selection means
 * no selection styling at all, which is `undefined`.
 */
export function selectedIndices(
  ids: readonly string[],
  selected: ReadonlySet<string>
): number[] | undefined {
  if (selected.size === 0) return undefined;
  const indices: number[] = [];
  ids.forEach((id, i) => {
    if (selected.has(id)) indices.push(i);
  });
  return indices;
}

/**
 * Recompute `selectedPoints` of every trace for a new selection
 */
export function reselectTraces(traces: readonly TraceSpec[], selected: ReadonlySet<string>): TraceSpec[] {
  return traces.map(trace => {
    const next: TraceSpec = { ...trace };
    const selectedPoints = selectedIndices(trace.ids, selected);
    if (selectedPoints) next.selectedPoints = selectedPoints;
    else delete next.selectedPoints;
    return next;
  });
}

// ============= Hover =============

export interface HoverParams {
  /** Add the hover columns after the id and group lines */
  hoverDetailed: boolean;
  /** Attribute columns of the detailed hover; empty shows every attribute */
  hoverColumns: readonly string[];
}

function hoverLine(label: string, value: AttributeValue | undefined): string[] {
  return value === null || value === undefined ? [] : [`${label}: ${String(value)}`];
}

/**
 * Hover text per entity, one field per line: the id, the grouping value,
 * then in detailed mode the hover columns. Missing values are left out.
 */
export function hoverTexts(
  entities: readonly Entity[],
  table: EntityTable,
  aesthetics: AestheticsTable,
  hover: HoverParams
): string[] {
  const grouping = aesthetics.grouping;
  const requested = hover.hoverColumns.length > 0
    ? hover.hoverColumns
    : table.attributes.map(a => a.name);
  const columns = hover.hoverDetailed ? requested.filter(c => c !== grouping && c !== 'id') : [];

  return entities.map(entity => {
    const lines = [`ID: ${entity.id}`];
    if (grouping !== null) lines.push(...hoverLine(grouping, entity.attributes[grouping]));
    for (const column of columns) {
      lines.push(...hoverLine(column, entity.attributes[column]));
    }
    return lines.join('\n');
  });
}
