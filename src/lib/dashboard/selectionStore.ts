/**
 * Selection Store - canonical selection state of one dashboard session
 *
 * Every update replaces the Selection wholesale and bumps the generation.
 * The store is an external store in the useSyncExternalStore sense:
 * `getSnapshot` returns a stable object until the next update and
 * `subscribe` returns its own unsubscribe function.
 */

import { createLogger } from '@/lib/logger';
import type { EntityTable, Selection, SelectionOrigin } from '@/types/dashboard';
import type { InvalidQueryError } from './errors';
import { evaluateQuery } from './query';

const logger = createLogger('SelectionStore');

const MAX_HISTORY = 10;

export type SelectionListener = (selection: Selection) => void;

export type QueryResult =
  | { ok: true; selection: Selection }
  | { ok: false; error: InvalidQueryError };

export interface SelectionStoreOptions {
  /** Ids selected at startup; unknown ids are dropped */
  preset?: Iterable<string>;
}

export class SelectionStore {
  private readonly table: EntityTable;
  private readonly listeners = new Set<SelectionListener>();
  private current: Selection;
  private history: ReadonlySet<string>[];
  private historyIndex = 0;

  constructor(table: EntityTable, options: SelectionStoreOptions = {}) {
    this.table = table;
    const initial = this.restrict(options.preset ?? []);
    this.current = Object.freeze({ ids: initial, origin: 'system', generation: 0 });
    this.history = [initial];
    if (initial.size > 0) {
      logger.info(`Preset selection of ${initial.size} entities`);
    }
  }

  getSnapshot = (): Selection => this.current;

  subscribe = (listener: SelectionListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Replace the selection. Unknown ids are dropped, never rejected.
   */
  setSelection(ids: Iterable<string>, origin: SelectionOrigin): Selection {
    const next = this.restrict(ids);
    this.record(next);
    return this.publish(next, origin);
  }

  clear(): Selection {
    return this.setSelection([], 'system');
  }

  selectAll(): Selection {
    return this.setSelection(this.table.entities.map(e => e.id), 'system');
  }

  /**
   * Add the ids that are not selected and remove the ones that are.
   */
  toggle(ids: Iterable<string>, origin: SelectionOrigin): Selection {
    const next = new Set(this.current.ids);
    for (const id of ids) {
      if (next.has(id)) next.delete(id);
      else next.add(id);
    }
    return this.setSelection(next, origin);
  }

  /**
   * Select the entities matching a filter expression. A blank expression
   * selects everything. On error the selection is left untouched.
   */
  filterByQuery(expression: string): QueryResult {
    if (expression.trim() === '') {
      return { ok: true, selection: this.setSelection(this.table.entities.map(e => e.id), 'query') };
    }
    const result = evaluateQuery(expression, this.table);
    if (!result.ok) {
      logger.debug('Query rejected:', result.error.message);
      return result;
    }
    logger.debug(`Query matched ${result.ids.length} entities`);
    return { ok: true, selection: this.setSelection(result.ids, 'query') };
  }

  canUndo(): boolean {
    return this.historyIndex > 0;
  }

  canRedo(): boolean {
    return this.historyIndex < this.history.length - 1;
  }

  /**
   * Step back in history. Publishes a new Selection (new generation) with
   * the previous ids; returns null when there is nothing to undo.
   */
  undo(): Selection | null {
    if (!this.canUndo()) return null;
    this.historyIndex -= 1;
    return this.publish(this.history[this.historyIndex], 'system');
  }

  redo(): Selection | null {
    if (!this.canRedo()) return null;
    this.historyIndex += 1;
    return this.publish(this.history[this.historyIndex], 'system');
  }

  counterLabel(): string {
    return `Selected: ${this.current.ids.size} / ${this.table.entities.length}`;
  }

  private restrict(ids: Iterable<string>): ReadonlySet<string> {
    const kept = new Set<string>();
    let dropped = 0;
    for (const id of ids) {
      if (this.table.has(id)) kept.add(id);
      else dropped += 1;
    }
    if (dropped > 0) {
      logger.debug(`Dropped ${dropped} unknown ids`);
    }
    return kept;
  }

  private record(ids: ReadonlySet<string>) {
    const history = this.history.slice(0, this.historyIndex + 1);
    history.push(ids);
    if (history.length > MAX_HISTORY) {
      history.shift();
    }
    this.history = history;
    this.historyIndex = history.length - 1;
  }

  private publish(ids: ReadonlySet<string>, origin: SelectionOrigin): Selection {
    this.current = Object.freeze({ ids, origin, generation: this.current.generation + 1 });
    const selection = this.current;
    for (const listener of [...this.listeners]) {
      listener(selection);
    }
    return selection;
  }
}
