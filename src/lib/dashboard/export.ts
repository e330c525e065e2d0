/**
 * Export documents for the current selection and aesthetics
 *
 * Produces file contents and names; writing or downloading them is up to
 * the host application.
 */

import type { AestheticOverrides, AestheticsTable, EntityTable, Selection } from '@/types/dashboard';
import { serialize, serializeOverrides } from './aesthetics';

export type ExportFormat = 'txt' | 'json';

export interface ExportDocument {
  filename: string;
  mimeType: string;
  content: string;
}

export interface ExportOptions {
  /** Filename without extension */
  filename?: string;
  includeTimestamp?: boolean;
  /** Clock used for the timestamp */
  now?: Date;
}

const MIME_TYPES: Record<ExportFormat, string> = {
  txt: 'text/plain;charset=utf-8',
  json: 'application/json;charset=utf-8',
};

export const SELECTION_FILENAME = 'selected_samples';
export const AESTHETICS_FILENAME = 'aesthetics';

/**
 * Timestamp for filenames, e.g. 20240131_154502
 */
function getTimestamp(now: Date): string {
  return now.toISOString().slice(0, 19).replace(/[:-]/g, '').replace('T', '_');
}

export function generateFilename(
  base: string,
  extension: ExportFormat,
  includeTimestamp = false,
  now: Date = new Date()
): string {
  const timestamp = includeTimestamp ? `_${getTimestamp(now)}` : '';
  return `${base}${timestamp}.${extension}`;
}

// ============= Selection =============

/**
 * Selected ids in table order
 */
export function selectionToIds(table: EntityTable, selection: Selection): string[] {
  return table.entities.filter(e => selection.ids.has(e.id)).map(e => e.id);
}

/**
 * One id per line, each line newline-terminated
 */
export function selectionToText(table: EntityTable, selection: Selection): string {
  return selectionToIds(table, selection).map(id => `${id}\n`).join('');
}

export function exportSelection(
  table: EntityTable,
  selection: Selection,
  options: ExportOptions = {}
): ExportDocument {
  const { filename = SELECTION_FILENAME, includeTimestamp = false, now } = options;
  return {
    filename: generateFilename(filename, 'txt', includeTimestamp, now),
    mimeType: MIME_TYPES.txt,
    content: selectionToText(table, selection),
  };
}

/**
 * Read a saved selection back. Blank lines are ignored; ids the table
 * does not know are counted, not returned.
 */
export function parseSelectionText(
  text: string,
  table: EntityTable
): { ids: string[]; unmappedCount: number } {
  const ids: string[] = [];
  let unmappedCount = 0;
  for (const line of text.split(/\r?\n/)) {
    const id = line.trim();
    if (!id) continue;
    if (table.has(id)) ids.push(id);
    else unmappedCount += 1;
  }
  return { ids, unmappedCount };
}

// ============= Aesthetics =============

export function exportAesthetics(table: AestheticsTable, options: ExportOptions = {}): ExportDocument {
  const { filename = AESTHETICS_FILENAME, includeTimestamp = false, now } = options;
  return {
    filename: generateFilename(filename, 'json', includeTimestamp, now),
    mimeType: MIME_TYPES.json,
    content: serialize(table),
  };
}

export function exportOverrides(
  overrides: AestheticOverrides,
  grouping: string | null,
  options: ExportOptions = {}
): ExportDocument {
  const { filename = `${AESTHETICS_FILENAME}_overrides`, includeTimestamp = false, now } = options;
  return {
    filename: generateFilename(filename, 'json', includeTimestamp, now),
    mimeType: MIME_TYPES.json,
    content: serializeOverrides(overrides, grouping),
  };
}
