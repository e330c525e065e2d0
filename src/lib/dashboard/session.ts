/**
 * Dashboard Session - the per-client context object
 *
 * Owns the selection store, the aesthetics manager, the router and one
 * controller per view. Nothing here is module state: two sessions over the
 * same entity table never see each other's selection or overrides. Only
 * the figure cache may be shared, since its keys fingerprint every input.
 */

import { createLogger } from '@/lib/logger';
import type {
  EntityTable,
  Figure,
  Selection,
  StyleOverride,
  ViewKind,
} from '@/types/dashboard';
import { VIEW_KINDS } from '@/types/dashboard';
import { AestheticsManager, deserializeOverrides } from './aesthetics';
import { mapAdapter, type MapEvent, type MapParams } from './adapters/map';
import { scatterAdapter, type ScatterEvent, type ScatterParams } from './adapters/scatter';
import { tableAdapter, type TableEvent, type TableParams } from './adapters/table';
import { timeAdapter, type TimeEvent, type TimeParams } from './adapters/time';
import type { HoverParams } from './adapters/traces';
import type { Availability } from './adapters/types';
import { parseDashboardConfig, type DashboardConfig } from './config';
import { buildEntityTable, resolveAxes, resolveColumns } from './entityTable';
import type { UnknownAttributeError } from './errors';
import { EventRouter } from './eventRouter';
import {
  exportAesthetics,
  exportOverrides,
  exportSelection,
  selectionToIds,
  type ExportDocument,
  type ExportOptions,
} from './export';
import { FigureCache } from './figureCache';
import { SelectionStore, type QueryResult } from './selectionStore';
import { ViewController, type ViewContext } from './viewController';

const logger = createLogger('DashboardSession');

export interface ViewEvents {
  scatter: ScatterEvent;
  map: MapEvent;
  time: TimeEvent;
  table: TableEvent;
}

export interface ViewParams {
  scatter: ScatterParams;
  map: MapParams;
  time: TimeParams;
  table: TableParams;
}

export type ViewControllers = {
  [K in ViewKind]: ViewController<ViewEvents[K], ViewParams[K]>;
};

export interface DashboardSessionOptions {
  /** Figure cache shared with other sessions; a private one by default */
  cache?: FigureCache;
}

export class DashboardSession {
  readonly table: EntityTable;
  readonly config: DashboardConfig;
  readonly selection: SelectionStore;
  readonly aesthetics: AestheticsManager;
  readonly router: EventRouter;
  readonly cache: FigureCache;
  readonly views: ViewControllers;
  /** Fallbacks applied while reading the configuration */
  readonly warnings: readonly UnknownAttributeError[];
  private readonly detach: () => void;

  /**
   * Validate raw inputs and start a session.
   *
   * @throws DataStructureError for a malformed entity table
   * @throws ConfigError for an invalid configuration
   * @throws AestheticsFormatError for unreadable saved aesthetics
   */
  static create(
    tableInput: unknown,
    configInput: unknown = {},
    options: DashboardSessionOptions = {}
  ): DashboardSession {
    return new DashboardSession(buildEntityTable(tableInput), parseDashboardConfig(configInput), options);
  }

  constructor(table: EntityTable, config: DashboardConfig, options: DashboardSessionOptions = {}) {
    this.table = table;
    this.config = config;
    this.cache = options.cache ?? new FigureCache(config.cache.capacity);
    const warnings: UnknownAttributeError[] = [];

    this.aesthetics = new AestheticsManager(table, {
      grouping: null,
      defaults: config.style,
      ...(config.aesthetics !== undefined ? { overrides: deserializeOverrides(config.aesthetics) } : {}),
    });
    warnings.push(...this.aesthetics.setGrouping(config.grouping));

    this.selection = new SelectionStore(table, { preset: config.presetSelection });
    this.router = new EventRouter();

    const context: ViewContext = {
      table,
      cache: this.cache,
      aesthetics: () => this.aesthetics.current(),
      selection: () => this.selection.getSnapshot(),
    };

    let dimensions = config.dimensions;
    if (dimensions === 3 && table.axisNames.length < 3) {
      logger.warn(`Only ${table.axisNames.length} axes available, using a 2D scatter`);
      dimensions = 2;
    }
    const axes = resolveAxes(table, config.axes, dimensions);
    warnings.push(...axes.errors);

    const columns = resolveColumns(table, config.table.columns ?? table.attributes.map(a => a.name));
    warnings.push(...columns.errors);

    let hoverColumns = columns.value;
    if (config.hover.columns !== null) {
      const resolved = resolveColumns(table, config.hover.columns);
      warnings.push(...resolved.errors);
      hoverColumns = resolved.value;
    }
    const hover: HoverParams = { hoverDetailed: config.hover.detailed, hoverColumns };

    this.views = {
      scatter: new ViewController(scatterAdapter, context, {
        axes: axes.value,
        dimensions,
        showLegend: config.legend.show,
        labelLength: config.legend.labelLength,
        webglThreshold: config.scatter.webglThreshold,
        ...hover,
      }),
      map: new ViewController(mapAdapter, context, {
        showLegend: config.legend.show,
        labelLength: config.legend.labelLength,
        ...hover,
      }),
      time: new ViewController(timeAdapter, context, {
        plot: config.time.plot,
        nbins: config.time.nbins,
        invert: config.time.invert,
        axisLabel: config.time.label,
        labelLength: config.legend.labelLength,
        ...hover,
      }),
      table: new ViewController(tableAdapter, context, { columns: columns.value }),
    };

    const unregister = VIEW_KINDS.map(kind => this.router.register(this.views[kind]));
    const unsubscribe = this.selection.subscribe(selection => this.router.publish(selection));
    this.detach = () => {
      unsubscribe();
      unregister.forEach(fn => fn());
    };

    this.warnings = warnings;
    logger.info(
      `Session ready: ${table.entities.length} entities, grouping ${this.aesthetics.getGrouping() ?? 'none'}`
    );
  }

  // ============= Selection =============

  getSelection(): Selection {
    return this.selection.getSnapshot();
  }

  /**
   * Turn a view interaction into the new selection. Disabled views
   * produce no update and return null.
   */
  interact<K extends ViewKind>(kind: K, event: ViewEvents[K]): Selection | null {
    const view: ViewControllers[K] = this.views[kind];
    if (!view.isEnabled()) {
      logger.debug(`Ignoring ${kind} interaction, view disabled`);
      return null;
    }
    const ids = view.interact(event);
    return this.selection.setSelection(ids, kind);
  }

  /**
   * Flip table checkboxes: selected rows are removed, others added.
   */
  toggleRows(ids: readonly string[]): Selection | null {
    const next = new Set(this.getSelection().ids);
    for (const id of ids) {
      if (next.has(id)) next.delete(id);
      else next.add(id);
    }
    return this.interact('table', { type: 'rows', ids: [...next] });
  }

  filterByQuery(expression: string): QueryResult {
    return this.selection.filterByQuery(expression);
  }

  clearSelection(): Selection {
    return this.selection.clear();
  }

  selectAll(): Selection {
    return this.selection.selectAll();
  }

  undo(): Selection | null {
    return this.selection.undo();
  }

  redo(): Selection | null {
    return this.selection.redo();
  }

  counterLabel(): string {
    return this.selection.counterLabel();
  }

  // ============= View Parameters =============

  availability(kind: ViewKind): Availability {
    return this.views[kind].availability;
  }

  figure(kind: ViewKind): Figure {
    return this.views[kind].figure();
  }

  setGrouping(grouping: string | null): UnknownAttributeError[] {
    const errors = this.aesthetics.setGrouping(grouping);
    this.refreshViews(VIEW_KINDS);
    return errors;
  }

  setAxes(requested: readonly string[]): UnknownAttributeError[] {
    const params = this.views.scatter.getParams();
    const { value, errors } = resolveAxes(this.table, requested, params.dimensions);
    this.updateParams('scatter', { ...params, axes: value });
    return errors;
  }

  /**
   * Switch between 2D and 3D. 3D needs a third axis; without one the
   * scatter stays 2D and `false` is returned.
   */
  setDimensions(dimensions: 2 | 3): boolean {
    if (dimensions === 3 && this.table.axisNames.length < 3) {
      logger.warn('3D scatter needs at least three axes');
      return false;
    }
    const params = this.views.scatter.getParams();
    const { value } = resolveAxes(this.table, params.axes, dimensions);
    this.updateParams('scatter', { ...params, axes: value, dimensions });
    return true;
  }

  setLegend(show: boolean, labelLength?: number): void {
    const scatter = this.views.scatter.getParams();
    const map = this.views.map.getParams();
    const time = this.views.time.getParams();
    const length = labelLength ?? scatter.labelLength;
    this.updateParams('scatter', { ...scatter, showLegend: show, labelLength: length });
    this.updateParams('map', { ...map, showLegend: show, labelLength: length });
    this.updateParams('time', { ...time, labelLength: length });
  }

  setTimeOptions(options: Partial<Pick<TimeParams, 'plot' | 'nbins' | 'invert'>>): void {
    this.updateParams('time', { ...this.views.time.getParams(), ...options });
  }

  /**
   * Switch between the short hover (id and group) and the detailed one.
   * `columns` replaces the detailed hover columns when given.
   */
  setHover(detailed: boolean, columns?: readonly string[]): UnknownAttributeError[] {
    const scatter = this.views.scatter.getParams();
    const hover: HoverParams = { hoverDetailed: detailed, hoverColumns: scatter.hoverColumns };
    const errors: UnknownAttributeError[] = [];
    if (columns !== undefined) {
      const resolved = resolveColumns(this.table, columns);
      errors.push(...resolved.errors);
      hover.hoverColumns = resolved.value;
    }
    this.updateParams('scatter', { ...scatter, ...hover });
    this.updateParams('map', { ...this.views.map.getParams(), ...hover });
    this.updateParams('time', { ...this.views.time.getParams(), ...hover });
    return errors;
  }

  setTableColumns(requested: readonly string[]): UnknownAttributeError[] {
    const { value, errors } = resolveColumns(this.table, requested);
    this.updateParams('table', { columns: value });
    return errors;
  }

  // ============= Aesthetics =============

  setEntityOverride(id: string, override: StyleOverride | null): void {
    this.aesthetics.setEntityOverride(id, override);
    this.refreshViews(VIEW_KINDS);
  }

  setGroupOverride(value: string, override: StyleOverride | null): void {
    this.aesthetics.setGroupOverride(value, override);
    this.refreshViews(VIEW_KINDS);
  }

  setUnselectedOverride(override: StyleOverride | null): void {
    this.aesthetics.setUnselectedOverride(override);
    this.refreshViews(VIEW_KINDS);
  }

  clearOverrides(): void {
    this.aesthetics.clearOverrides();
    this.refreshViews(VIEW_KINDS);
  }

  /**
   * Restore saved overrides. A bad document leaves the current overrides
   * in place and rethrows.
   */
  importOverrides(blob: unknown): void {
    this.aesthetics.importOverrides(blob);
    this.refreshViews(VIEW_KINDS);
  }

  // ============= Export =============

  selectedIds(): string[] {
    return selectionToIds(this.table, this.getSelection());
  }

  exportSelection(options?: ExportOptions): ExportDocument {
    return exportSelection(this.table, this.getSelection(), options);
  }

  exportAesthetics(options?: ExportOptions): ExportDocument {
    return exportAesthetics(this.aesthetics.current(), options);
  }

  exportOverrides(options?: ExportOptions): ExportDocument {
    return exportOverrides(this.aesthetics.getOverrides(), this.aesthetics.getGrouping(), options);
  }

  dispose(): void {
    this.detach();
  }

  private updateParams<K extends ViewKind>(kind: K, params: ViewParams[K]) {
    const view: ViewControllers[K] = this.views[kind];
    view.setParams(params);
    this.refreshViews([kind]);
  }

  private refreshViews(kinds: readonly ViewKind[]) {
    const selection = this.getSelection();
    for (const kind of kinds) {
      this.router.refreshStructure(kind, selection);
    }
  }
}
