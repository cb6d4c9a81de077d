/**
 * HistoryStore - CSV time series of snapshots plus the latest.json document
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import * as Papa from 'papaparse';
import { SOURCE_KINDS, type Snapshot } from '../types';
import { describeError, PersistenceError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import {
  type CellValue,
  columnDefault,
  type HistoryRow,
  type HistorySeries,
  parseCell,
  projectSnapshot,
  TIMESTAMP_COLUMN
} from './columns';
import { computeGrowth } from './growth';

const NEWLINE = '\n';

export interface HistoryStoreOptions {
  /** Output directory, created on first write */
  dir: string;
  historyFile?: string;
  latestFile?: string;
  growthWindowDays?: number;
  logger?: Logger;
}

export interface LatestDocument {
  timestamp: string;
  growth: Record<string, number>;
  [kind: string]: unknown;
}

interface RawHistory {
  text: string;
  header: string[];
  rows: string[][];
}

function toCsv(rows: CellValue[][]): string {
  return Papa.unparse(rows, { newline: NEWLINE });
}

/**
 * Single-writer store: callers must not run two appends against the same
 * directory at once.
 */
export class HistoryStore {
  readonly historyPath: string;
  readonly latestPath: string;
  private readonly dir: string;
  private readonly growthWindowDays: number;
  private readonly logger: Logger;

  constructor(options: HistoryStoreOptions) {
    this.dir = options.dir;
    this.historyPath = path.join(options.dir, options.historyFile ?? 'community_metrics.csv');
    this.latestPath = path.join(options.dir, options.latestFile ?? 'latest.json');
    this.growthWindowDays = options.growthWindowDays ?? 30;
    this.logger = (options.logger ?? getLogger()).forOperation('history');
  }

  /**
   * Parse the history back into typed rows. A missing file is an empty series.
   */
  async read(): Promise<HistorySeries> {
    const raw = await this.readRaw();
    if (!raw) {
      return { header: [], rows: [] };
    }

    const rows = raw.rows.map((cells) => {
      const row: HistoryRow = {};
      raw.header.forEach((column, index) => {
        row[column] = parseCell(column, cells[index]);
      });
      return row;
    });
    return { header: raw.header, rows };
  }

  /**
   * Add the snapshot as one row. New columns widen the header and the whole
   * file is rewritten with defaults in earlier rows; otherwise the row is
   * appended in place.
   */
  async append(snapshot: Snapshot): Promise<HistoryRow> {
    const row = projectSnapshot(snapshot);
    const rowColumns = Object.keys(row);

    try {
      await fs.mkdir(this.dir, { recursive: true });
      const existing = await this.readRaw();

      if (!existing) {
        await this.writeAtomic(
          this.historyPath,
          toCsv([rowColumns, rowColumns.map((column) => row[column])]) + NEWLINE
        );
        this.logger.info('Created history file', {
          path: this.historyPath,
          columns: rowColumns.length,
        });
        return row;
      }

      this.checkOrdering(existing, snapshot);

      const added = rowColumns.filter((column) => !existing.header.includes(column));
      const header = [...existing.header, ...added];
      const line = header.map((column) => row[column] ?? columnDefault(column));

      if (added.length > 0) {
        const backfilled = existing.rows.map((cells) =>
          header.map((column, index) =>
            index < existing.header.length ? (cells[index] ?? '') : columnDefault(column)
          )
        );
        await this.writeAtomic(this.historyPath, toCsv([header, ...backfilled, line]) + NEWLINE);
        this.logger.info('History schema extended', { added, rows: backfilled.length + 1 });
      } else {
        const separator = existing.text.endsWith(NEWLINE) ? '' : NEWLINE;
        await fs.appendFile(this.historyPath, separator + toCsv([line]) + NEWLINE, 'utf-8');
        this.logger.debug('Appended history row', { path: this.historyPath });
      }
    } catch (error) {
      throw this.persistenceError(this.historyPath, 'Failed to append history row', error);
    }

    return row;
  }

  /**
   * Replace latest.json with the snapshot and its growth figures
   */
  async writeLatest(snapshot: Snapshot): Promise<LatestDocument> {
    try {
      const series = await this.read();
      const document: LatestDocument = {
        timestamp: snapshot.timestamp.toISOString(),
        growth: computeGrowth(series, snapshot, this.growthWindowDays),
      };
      for (const kind of SOURCE_KINDS) {
        const record = snapshot.sources[kind];
        if (record) {
          document[kind] = record;
        }
      }

      await fs.mkdir(this.dir, { recursive: true });
      await this.writeAtomic(this.latestPath, JSON.stringify(document, null, 2) + NEWLINE);
      this.logger.info('Latest metrics written', { path: this.latestPath });
      return document;
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw this.persistenceError(this.latestPath, 'Failed to write latest metrics', error);
    }
  }

  /**
   * Append to history, then write latest.json. Nothing is written to
   * latest.json when the append fails.
   */
  async persist(snapshot: Snapshot): Promise<LatestDocument> {
    await this.append(snapshot);
    return this.writeLatest(snapshot);
  }

  private async readRaw(): Promise<RawHistory | undefined> {
    let text: string;
    try {
      text = await fs.readFile(this.historyPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw this.persistenceError(this.historyPath, 'Failed to read history', error);
    }

    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });
    if (parsed.errors.length > 0) {
      this.logger.warn('History file has malformed lines', {
        path: this.historyPath,
        errors: parsed.errors.map((issue) => `row ${issue.row}: ${issue.message}`),
      });
    }

    const [header, ...rows] = parsed.data;
    if (!header || header.length === 0) {
      return undefined;
    }
    return { text, header, rows };
  }

  private checkOrdering(existing: RawHistory, snapshot: Snapshot): void {
    const last = existing.rows[existing.rows.length - 1];
    const index = existing.header.indexOf(TIMESTAMP_COLUMN);
    if (!last || index < 0) {
      return;
    }

    const lastTime = Date.parse(last[index] ?? '');
    if (Number.isFinite(lastTime) && snapshot.timestamp.getTime() <= lastTime) {
      this.logger.warn('Snapshot is not later than the last history row', {
        last: last[index],
        timestamp: snapshot.timestamp.toISOString(),
      });
    }
  }

  private async writeAtomic(target: string, content: string): Promise<void> {
    const temporary = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temporary, content, 'utf-8');
    await fs.rename(temporary, target);
  }

  private persistenceError(target: string, message: string, error: unknown): PersistenceError {
    if (error instanceof PersistenceError) {
      return error;
    }
    this.logger.error(message, undefined, { path: target, error: describeError(error) });
    return new PersistenceError(target, message, error);
  }
}
