/**
 * Flat column projection of snapshots for the CSV history
 */

import { metricFields, SENTINEL_METRICS, SOURCE_KINDS, type Snapshot, type SourceKind } from '../types';

export const TIMESTAMP_COLUMN = 'timestamp';

export type CellValue = string | number;

/**
 * One history line keyed by column name
 */
export type HistoryRow = Record<string, CellValue>;

export interface HistorySeries {
  header: string[];
  rows: HistoryRow[];
}

const RECORD_COLUMNS = ['status', 'method'] as const;

export function columnName(kind: SourceKind, field: string): string {
  return `${kind}_${field}`;
}

/**
 * Source kind and field a column belongs to, if any
 */
export function splitColumn(column: string): { kind: SourceKind; field: string } | undefined {
  for (const kind of SOURCE_KINDS) {
    const prefix = `${kind}_`;
    if (column.startsWith(prefix) && column.length > prefix.length) {
      return { kind, field: column.slice(prefix.length) };
    }
  }
  return undefined;
}

/**
 * Value a column holds in rows written before it existed
 */
export function columnDefault(column: string): CellValue {
  const owner = splitColumn(column);
  if (!owner) {
    return '';
  }
  const sentinel: unknown = Reflect.get(SENTINEL_METRICS[owner.kind], owner.field);
  return typeof sentinel === 'number' ? 0 : '';
}

/**
 * Typed value of a raw CSV cell; numeric columns fall back to 0 when the
 * cell is empty or unreadable.
 */
export function parseCell(column: string, raw: string | undefined): CellValue {
  const fallback = columnDefault(column);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (typeof fallback === 'number') {
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }
  return raw;
}

/**
 * Snapshot as a single row: timestamp, then status, method and metric fields
 * per recorded source in column order.
 */
export function projectSnapshot(snapshot: Snapshot): HistoryRow {
  const row: HistoryRow = { [TIMESTAMP_COLUMN]: snapshot.timestamp.toISOString() };

  for (const kind of SOURCE_KINDS) {
    const record = snapshot.sources[kind];
    if (!record) {
      continue;
    }
    const values: Record<string, unknown> = { ...record };
    for (const field of [...RECORD_COLUMNS, ...metricFields(kind)]) {
      const value = values[field];
      const column = columnName(kind, field);
      row[column] =
        typeof value === 'number' || typeof value === 'string' ? value : columnDefault(column);
    }
  }

  return row;
}
