/**
 * Linked-views dashboard types
 *
 * Shared by the selection store, the aesthetics manager, the view adapters
 * and the figure cache. Everything here is plain data so that a session can
 * hand it to a rendering backend or serialize it for export.
 */

// ============= Entities =============

/** Value of a single annotation attribute */
export type AttributeValue = string | number | boolean | null;

export type AttributeKind = 'categorical' | 'continuous';

export interface GeoPoint {
  lat: number;
  lon: number;
}

/**
 * One sample of the dataset, with its PC coordinates and annotations.
 */
export interface Entity {
  readonly id: string;
  /** PC coordinates, index i is named by `EntityTable.axisNames[i]` */
  readonly coords: readonly number[];
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  readonly geo?: GeoPoint;
  readonly time?: number;
}

export interface AttributeMeta {
  name: string;
  kind: AttributeKind;
}

/**
 * Validated, read-only table shared by every view of a session.
 */
export interface EntityTable {
  readonly entities: readonly Entity[];
  readonly attributes: readonly AttributeMeta[];
  readonly axisNames: readonly string[];
  /** Content fingerprint, changes whenever any entity changes */
  readonly fingerprint: string;
  indexOf(id: string): number | undefined;
  get(id: string): Entity | undefined;
  has(id: string): boolean;
  attribute(name: string): AttributeMeta | undefined;
}

// ============= Selection =============

export type ViewKind = 'scatter' | 'map' | 'time' | 'table';

export const VIEW_KINDS: readonly ViewKind[] = ['scatter', 'map', 'time', 'table'];

/** Who produced a selection update */
export type SelectionOrigin = ViewKind | 'system' | 'query';

export interface Selection {
  readonly ids: ReadonlySet<string>;
  readonly origin: SelectionOrigin;
  readonly generation: number;
}

// ============= Aesthetics =============

export type MarkerSymbol =
  | 'circle'
  | 'square'
  | 'diamond'
  | 'cross'
  | 'x'
  | 'triangle-up'
  | 'triangle-down'
  | 'star';

export interface Style {
  color: string;
  size: number;
  opacity: number;
  symbol: MarkerSymbol;
}

export type StyleOverride = Partial<Style>;

export type ContinuousPalette =
  | 'viridis'
  | 'plasma'
  | 'inferno'
  | 'cividis'
  | 'blue_red'
  | 'coolwarm'
  | 'spectral'
  | 'blues'
  | 'greens'
  | 'turbo';

export type CategoricalPalette = 'plotly' | 'default' | 'tableau10' | 'set1' | 'set2' | 'paired';

export type GroupingKind = 'none' | AttributeKind;

/**
 * User overrides. Group overrides are keyed by grouping attribute first so
 * that they survive switching the grouping away and back.
 */
export interface AestheticOverrides {
  groups: Record<string, Record<string, StyleOverride>>;
  entities: Record<string, StyleOverride>;
  unselected?: StyleOverride;
}

/**
 * Resolved aesthetics for the active grouping.
 */
export interface AestheticsTable {
  grouping: string | null;
  groupingKind: GroupingKind;
  /** Set for continuous groupings */
  colorscale?: ContinuousPalette;
  /** Observed range of a continuous grouping */
  range?: { min: number; max: number };
  /** Style of entities without a group value */
  base: Style;
  /** Style applied to unselected entities while a selection is active */
  unselected: Style;
  /** Resolved style per group value (categorical groupings only) */
  groups: Record<string, Style>;
  /** Resolved style per entity id */
  entities: Record<string, Style>;
  /** Group value of each entity that has one */
  membership: Record<string, string>;
}

// ============= Figures =============

export type RendererHint = 'svg' | 'webgl';

export interface MarkerSpec {
  /** One value per point, or a single value for the whole trace */
  color: string | string[];
  opacity: number | number[];
  /** Absent for bar-like traces */
  size?: number | number[];
  symbol?: MarkerSymbol | MarkerSymbol[];
  colorscale?: ContinuousPalette;
  showScale?: boolean;
}

export interface TraceSpec {
  name: string;
  type: 'scatter' | 'scatter3d' | 'scattermap' | 'histogram' | 'table';
  ids: string[];
  x?: number[];
  y?: number[];
  z?: number[];
  lat?: number[];
  lon?: number[];
  /** Hover text per point, fields separated by newlines */
  text?: string[];
  marker?: MarkerSpec;
  unselectedMarker?: Pick<MarkerSpec, 'color' | 'size' | 'opacity'>;
  /** Indices (into `ids`) of selected points; undefined means no selection styling */
  selectedPoints?: number[];
  showLegend: boolean;
  renderer?: RendererHint;
}

export interface TableRow {
  id: string;
  cells: Record<string, AttributeValue>;
  selected: boolean;
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
  ids: string[];
}

export interface FigureLayout {
  title?: string;
  xTitle?: string;
  yTitle?: string;
  zTitle?: string;
  legendTitle?: string;
  showLegend: boolean;
  invertX?: boolean;
}

/**
 * Declarative, backend-independent description of a rendered view.
 */
export interface Figure {
  view: ViewKind;
  traces: TraceSpec[];
  layout: FigureLayout;
  /** Messages shown instead of (or on top of) data, e.g. "Nothing selected" */
  annotations: string[];
  rows?: TableRow[];
  columns?: string[];
  bins?: HistogramBin[];
  selectedBins?: HistogramBin[];
  scrollTo?: number | null;
}
