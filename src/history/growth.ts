import type { Snapshot } from '../types';
import {
  columnName,
  type HistoryRow,
  type HistorySeries,
  projectSnapshot,
  splitColumn,
  TIMESTAMP_COLUMN
} from './columns';

const DAY_MS = 24 * 60 * 60 * 1000;
const COMPARABLE_STATUSES: ReadonlySet<string> = new Set(['ok', 'partial']);

/** Metric fields reported with a growth figure */
export const GROWTH_FIELDS: ReadonlySet<string> = new Set([
  'stars',
  'contributors',
  'members',
  'subscribers',
  'downloads_last_month',
  'citations',
]);

function rowTime(row: HistoryRow): number {
  return Date.parse(String(row[TIMESTAMP_COLUMN]));
}

/**
 * Row to compare against: the newest one at least `windowDays` older than
 * the snapshot, else the oldest row before it.
 */
export function findBaseline(
  rows: readonly HistoryRow[],
  snapshotTime: number,
  windowDays: number
): HistoryRow | undefined {
  const earlier = rows
    .filter((row) => {
      const time = rowTime(row);
      return Number.isFinite(time) && time < snapshotTime;
    })
    .sort((a, b) => rowTime(a) - rowTime(b));

  const cutoff = snapshotTime - windowDays * DAY_MS;
  const old = earlier.filter((row) => rowTime(row) <= cutoff);
  return old.length > 0 ? old[old.length - 1] : earlier[0];
}

/**
 * Change of selected columns since the baseline row, keyed
 * `<column>_growth_<windowDays>d`. A source is skipped when it failed in
 * either row or was not recorded in the baseline.
 */
export function computeGrowth(
  series: HistorySeries,
  snapshot: Snapshot,
  windowDays = 30
): Record<string, number> {
  const baseline = findBaseline(series.rows, snapshot.timestamp.getTime(), windowDays);
  if (!baseline) {
    return {};
  }

  const current = projectSnapshot(snapshot);
  const growth: Record<string, number> = {};

  for (const [column, value] of Object.entries(current)) {
    const owner = splitColumn(column);
    if (!owner || !GROWTH_FIELDS.has(owner.field) || typeof value !== 'number') {
      continue;
    }
    if (
      snapshot.sources[owner.kind]?.status === 'failed' ||
      !COMPARABLE_STATUSES.has(String(baseline[columnName(owner.kind, 'status')]))
    ) {
      continue;
    }
    const previous = baseline[column];
    if (typeof previous !== 'number') {
      continue;
    }
    growth[`${column}_growth_${windowDays}d`] = value - previous;
  }

  return growth;
}
