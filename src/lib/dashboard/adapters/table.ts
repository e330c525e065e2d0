/**
 * Annotation table view. Rows keep input order; the selection only flips
 * each row's `selected` flag and moves the scroll target.
 */

import type { AttributeValue, Entity, Figure, TableRow } from '@/types/dashboard';
import { buildCacheKey, type ViewAdapter } from './types';

export interface TableParams {
  /** Attribute columns shown after `id` */
  columns: readonly string[];
}

export type TableEvent =
  | { type: 'rowClick'; id: string }
  | { type: 'rows'; ids: string[] };

function toRow(entity: Entity, columns: readonly string[], selected: ReadonlySet<string>): TableRow {
  const cells: Record<string, AttributeValue> = { id: entity.id };
  for (const column of columns) {
    cells[column] = entity.attributes[column] ?? null;
  }
  return { id: entity.id, cells, selected: selected.has(entity.id) };
}

function firstSelected(rows: readonly TableRow[]): number | null {
  const index = rows.findIndex(row => row.selected);
  return index >= 0 ? index : null;
}

export const tableAdapter: ViewAdapter<TableEvent, TableParams> = {
  kind: 'table',

  isAvailable() {
    return { available: true };
  },

  visibleIds(table) {
    return table.entities.map(e => e.id);
  },

  toSelection(event, table) {
    const ids = event.type === 'rowClick' ? [event.id] : event.ids;
    return new Set(ids.filter(id => table.has(id)));
  },

  cacheKey(table, selection, aesthetics, params) {
    return buildCacheKey('table', { columns: [...params.columns] }, table, selection, aesthetics);
  },

  render(table, selection, aesthetics, params) {
    const rows = table.entities.map(entity => toRow(entity, params.columns, selection.ids));
    const figure: Figure = {
      view: 'table',
      traces: [],
      layout: { showLegend: false },
      annotations: rows.length === 0 ? ['No samples loaded'] : [],
      columns: ['id', ...params.columns],
      rows,
      scrollTo: firstSelected(rows),
    };
    return { key: this.cacheKey(table, selection, aesthetics, params), figure };
  },

  highlight(figure, selection) {
    const rows = (figure.rows ?? []).map(row => ({
      ...row,
      selected: selection.ids.has(row.id),
    }));
    return { rows, scrollTo: firstSelected(rows) };
  },
};
