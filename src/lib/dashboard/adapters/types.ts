/**
 * View adapter contract
 *
 * An adapter is stateless: it turns interaction events into id sets and
 * (table, selection, aesthetics, params) into a declarative Figure. The
 * session owns the parameters and the last rendered figure of each view.
 */

import type {
  AestheticsTable,
  EntityTable,
  Figure,
  HistogramBin,
  Selection,
  TableRow,
  TraceSpec,
  ViewKind,
} from '@/types/dashboard';
import { CacheKey, type CacheParams } from '../figureCache';
import { fingerprintAesthetics, fingerprintSelection } from '../hashing';

/** MissingCapability travels as a value, never as an exception */
export type Availability =
  | { available: true }
  | { available: false; reason: string };

export interface FigureRequest {
  key: CacheKey;
  figure: Figure;
}

/**
 * Selection-dependent parts of a figure. Applying a patch to a figure
 * rendered for one selection yields the figure rendered for another.
 */
export interface HighlightPatch {
  traces?: TraceSpec[];
  annotations?: string[];
  rows?: TableRow[];
  selectedBins?: HistogramBin[];
  scrollTo?: number | null;
}

export interface ViewAdapter<TEvent, TParams> {
  readonly kind: ViewKind;
  isAvailable(table: EntityTable): Availability;
  /** Ids of the entities the view actually draws, in draw order */
  visibleIds(table: EntityTable, params: TParams): string[];
  /** Ids an interaction selects, restricted to `visibleIds` */
  toSelection(event: TEvent, table: EntityTable, params: TParams): Set<string>;
  cacheKey(table: EntityTable, selection: Selection, aesthetics: AestheticsTable, params: TParams): CacheKey;
  /** Pure and deterministic: equal keys give equal figures */
  render(table: EntityTable, selection: Selection, aesthetics: AestheticsTable, params: TParams): FigureRequest;
  /** `null` when the view cannot restyle a selection in place */
  highlight(figure: Figure, selection: Selection): HighlightPatch | null;
}

export function applyHighlight(figure: Figure, patch: HighlightPatch): Figure {
  return { ...figure, ...patch };
}

export function buildCacheKey(
  view: ViewKind,
  params: CacheParams,
  table: EntityTable,
  selection: Selection,
  aesthetics: AestheticsTable
): CacheKey {
  return new CacheKey({
    view,
    params,
    grouping: aesthetics.grouping,
    aestheticsFingerprint: fingerprintAesthetics(aesthetics),
    dataFingerprint: table.fingerprint,
    selectionFingerprint: fingerprintSelection(selection.ids),
  });
}

export function unavailableFigure(view: ViewKind, reason: string): Figure {
  return {
    view,
    traces: [],
    layout: { showLegend: false },
    annotations: [reason],
  };
}
