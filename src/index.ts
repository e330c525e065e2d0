export * from '@/types/dashboard';
export { createLogger, getLogLevel, setLogLevel, setLogSink } from '@/lib/logger';
export type { LogLevel, LogRecord, LogSink, Logger } from '@/lib/logger';

export * from '@/lib/dashboard/errors';
export {
  buildEntityTable,
  countWithGeo,
  countWithTime,
  findAxisSeries,
  inferAttributeKind,
  resolveAxes,
  resolveColumns,
  resolveGrouping,
  EntityTableInputSchema,
} from '@/lib/dashboard/entityTable';
export type { EntityInput, EntityTableInput, Resolved } from '@/lib/dashboard/entityTable';
export {
  AestheticsManager,
  abbreviateLabels,
  computeDefaults,
  deserialize,
  deserializeOverrides,
  mergeOverrides,
  serialize,
  serializeOverrides,
  shouldShowLegend,
  DEFAULT_BASE_STYLE,
  DEFAULT_UNSELECTED_STYLE,
} from '@/lib/dashboard/aesthetics';
export type { AestheticsDocument, OverridesDocument, StyleDefaults } from '@/lib/dashboard/aesthetics';
export { CATEGORICAL_PALETTES, CONTINUOUS_PALETTES, MAP_SYMBOLS, MARKER_SYMBOLS, valueRange } from '@/lib/dashboard/palettes';
export { compileQuery, evaluateQuery } from '@/lib/dashboard/query';
export type { CompiledQuery, QueryEvaluation } from '@/lib/dashboard/query';
export { SelectionStore } from '@/lib/dashboard/selectionStore';
export type { QueryResult, SelectionListener } from '@/lib/dashboard/selectionStore';
export { CacheKey, FigureCache } from '@/lib/dashboard/figureCache';
export type { CacheEntry, CacheParams, CacheStats } from '@/lib/dashboard/figureCache';
export { EventRouter } from '@/lib/dashboard/eventRouter';
export type { RouteOutcome, RoutedView } from '@/lib/dashboard/eventRouter';
export { applyHighlight } from '@/lib/dashboard/adapters/types';
export { hoverTexts } from '@/lib/dashboard/adapters/traces';
export type { HoverParams } from '@/lib/dashboard/adapters/traces';
export type { Availability, FigureRequest, HighlightPatch, ViewAdapter } from '@/lib/dashboard/adapters/types';
export { scatterAdapter } from '@/lib/dashboard/adapters/scatter';
export type { ScatterEvent, ScatterParams } from '@/lib/dashboard/adapters/scatter';
export { mapAdapter } from '@/lib/dashboard/adapters/map';
export type { MapEvent, MapParams } from '@/lib/dashboard/adapters/map';
export { timeAdapter, computeBins } from '@/lib/dashboard/adapters/time';
export type { TimeEvent, TimeParams, TimePlot } from '@/lib/dashboard/adapters/time';
export { tableAdapter } from '@/lib/dashboard/adapters/table';
export type { TableEvent, TableParams } from '@/lib/dashboard/adapters/table';
export { ViewController } from '@/lib/dashboard/viewController';
export { DashboardConfigSchema, parseDashboardConfig } from '@/lib/dashboard/config';
export type { DashboardConfig, DashboardConfigInput } from '@/lib/dashboard/config';
export {
  exportAesthetics,
  exportOverrides,
  exportSelection,
  parseSelectionText,
  selectionToIds,
  selectionToText,
} from '@/lib/dashboard/export';
export type { ExportDocument, ExportOptions } from '@/lib/dashboard/export';
export { DashboardSession } from '@/lib/dashboard/session';
export type { DashboardSessionOptions, ViewControllers, ViewEvents, ViewParams } from '@/lib/dashboard/session';
