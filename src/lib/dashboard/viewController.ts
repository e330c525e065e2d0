/**
 * Per-session state of one view: its parameters, the figure it shows and
 * the ids its last interaction produced. Bridges a stateless adapter to the
 * router and the figure cache.
 */

import { createLogger } from '@/lib/logger';
import type { AestheticsTable, EntityTable, Figure, Selection, ViewKind } from '@/types/dashboard';
import type { RefreshOutcome, RoutedView } from './eventRouter';
import type { CacheKey, FigureCache } from './figureCache';
import {
  applyHighlight,
  unavailableFigure,
  type Availability,
  type FigureRequest,
  type ViewAdapter,
} from './adapters/types';

const logger = createLogger('ViewController');

export interface ViewContext {
  table: EntityTable;
  cache: FigureCache;
  aesthetics(): AestheticsTable;
  selection(): Selection;
}

export type FigureListener = (figure: Figure) => void;

function sameIds(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) {
    if (!b.has(id)) return false;
  }
  return true;
}

export class ViewController<TEvent, TParams> implements RoutedView {
  readonly kind: ViewKind;
  readonly availability: Availability;
  private readonly adapter: ViewAdapter<TEvent, TParams>;
  private readonly context: ViewContext;
  private readonly listeners = new Set<FigureListener>();
  private params: TParams;
  private current: FigureRequest | null = null;
  private produced: ReadonlySet<string> | null = null;
  private placeholder: Figure | null = null;

  constructor(adapter: ViewAdapter<TEvent, TParams>, context: ViewContext, params: TParams) {
    this.adapter = adapter;
    this.context = context;
    this.params = params;
    this.kind = adapter.kind;
    this.availability = adapter.isAvailable(context.table);
    if (!this.availability.available) {
      logger.info(`${this.kind} view disabled: ${this.availability.reason}`);
    }
  }

  isEnabled(): boolean {
    return this.availability.available;
  }

  getParams(): TParams {
    return this.params;
  }

  /**
   * Replace the view parameters. The caller asks the router to rebuild.
   */
  setParams(params: TParams): void {
    this.params = params;
  }

  visibleIds(): string[] {
    return this.isEnabled() ? this.adapter.visibleIds(this.context.table, this.params) : [];
  }

  /**
   * Translate an interaction into ids and remember them, so the broadcast
   * of the resulting selection only acknowledges this view.
   */
  interact(event: TEvent): Set<string> {
    if (!this.isEnabled()) return new Set();
    const ids = this.adapter.toSelection(event, this.context.table, this.params);
    this.produced = ids;
    return ids;
  }

  /** Key of the figure the view should show right now */
  currentKey(selection: Selection = this.context.selection()): CacheKey {
    return this.adapter.cacheKey(this.context.table, selection, this.context.aesthetics(), this.params);
  }

  /** Build a figure request without touching the view state */
  requestFigure(selection: Selection = this.context.selection()): FigureRequest {
    return this.adapter.render(this.context.table, selection, this.context.aesthetics(), this.params);
  }

  /**
   * Store a finished figure unless parameters moved on while it was being
   * built. Returns whether the figure was kept.
   */
  commitFigure(request: FigureRequest): boolean {
    if (!request.key.equals(this.currentKey())) {
      logger.debug(`Discarding stale ${this.kind} figure`);
      return false;
    }
    this.context.cache.put(request.key, request.figure);
    this.show(request, true);
    return true;
  }

  /** The figure currently shown, built on first use */
  figure = (): Figure => {
    if (!this.availability.available) {
      this.placeholder ??= unavailableFigure(this.kind, this.availability.reason);
      return this.placeholder;
    }
    if (this.current) {
      return this.current.figure;
    }
    const request = this.build(this.context.selection());
    this.show(request, false);
    return request.figure;
  };

  subscribe = (listener: FigureListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  // ============= RoutedView =============

  reflects(selection: Selection): boolean {
    if (this.current?.key.equals(this.currentKey(selection))) {
      return true;
    }
    if (!this.produced || !sameIds(this.produced, selection.ids)) return false;
    // Views that cannot restyle in place never show a selection by themselves
    return this.current === null || this.adapter.highlight(this.current.figure, selection) !== null;
  }

  acknowledge(selection: Selection): void {
    this.produced = null;
    if (!this.current) return;
    const patch = this.adapter.highlight(this.current.figure, selection);
    if (patch) {
      this.show({ key: this.currentKey(selection), figure: applyHighlight(this.current.figure, patch) }, false);
    }
  }

  refresh(selection: Selection): RefreshOutcome {
    this.produced = null;
    const key = this.currentKey(selection);
    if (this.current && this.current.key.structuralKey() === key.structuralKey()) {
      const patch = this.adapter.highlight(this.current.figure, selection);
      if (patch) {
        const figure = applyHighlight(this.current.figure, patch);
        this.context.cache.put(key, figure);
        this.show({ key, figure }, true);
        return 'highlighted';
      }
    }
    this.show(this.build(selection), true);
    return 'rebuilt';
  }

  rebuild(selection: Selection): void {
    this.produced = null;
    this.show(this.build(selection), true);
  }

  private build(selection: Selection): FigureRequest {
    const key = this.currentKey(selection);
    const { figure } = this.context.cache.getOrBuild(key, () => this.requestFigure(selection).figure);
    return { key, figure };
  }

  private show(request: FigureRequest, notify: boolean) {
    this.current = request;
    if (!notify) return;
    for (const listener of [...this.listeners]) {
      listener(request.figure);
    }
  }
}
