/**
 * MetricsAggregator - runs every enabled collector once and merges the
 * records into a single Snapshot
 */

import type { SourceCollector } from '../collectors/types';
import {
  createSnapshot,
  type Snapshot,
  type SourceKind,
  type SourceRecord,
  type SourceRecordMap,
  sentinelRecordFor
} from '../types';
import { AggregationError, TimeoutError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_SOURCE_TIMEOUT_MS = 60_000;
export const DEFAULT_RUN_BUDGET_MS = 300_000;

export interface MetricsAggregatorOptions {
  /** Collectors running at the same time */
  concurrency?: number;
  /** Deadline for a single source */
  sourceTimeoutMs?: number;
  /** Wall-clock budget for the whole run */
  runBudgetMs?: number;
  logger?: Logger;
  /** Clock used to stamp the snapshot */
  now?: () => Date;
}

export class MetricsAggregator {
  private readonly concurrency: number;
  private readonly sourceTimeoutMs: number;
  private readonly runBudgetMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: MetricsAggregatorOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
    this.runBudgetMs = options.runBudgetMs ?? DEFAULT_RUN_BUDGET_MS;
    this.logger = (options.logger ?? getLogger()).forOperation('aggregate');
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Collect from every enabled source. Disabled collectors are left out of
   * the snapshot entirely; a source that fails, rejects or runs out of time
   * is recorded as `failed` without affecting the others.
   */
  async aggregate(collectors: readonly SourceCollector[]): Promise<Snapshot> {
    const enabled = collectors.filter((collector) => collector.isEnabled());
    if (enabled.length === 0) {
      throw new AggregationError('No enabled sources configured');
    }

    const timestamp = this.now();
    const records = new Map<SourceKind, SourceRecord>();
    const endTimer = this.logger.startTimer('collection run');
    let budgetExpired = false;
    let next = 0;

    const worker = async (): Promise<void> => {
      while (!budgetExpired && next < enabled.length) {
        const collector = enabled[next++];
        const record = await this.runCollector(collector);
        if (!budgetExpired) {
          records.set(collector.kind, record);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, enabled.length) }, () =>
      worker()
    );

    try {
      await withTimeout(Promise.all(workers), this.runBudgetMs, 'collection run');
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      budgetExpired = true;
      this.logger.warn('Run budget exhausted, abandoning unfinished sources', {
        runBudgetMs: this.runBudgetMs,
        completed: records.size,
        total: enabled.length,
      });
    }

    const sources: SourceRecordMap = {};
    for (const collector of enabled) {
      sources[collector.kind] =
        records.get(collector.kind) ?? sentinelRecordFor(collector.kind, 'failed');
    }

    endTimer();
    return createSnapshot(timestamp, sources);
  }

  private async runCollector(collector: SourceCollector): Promise<SourceRecord> {
    const logger = this.logger.forSource(collector.kind);

    try {
      return await withTimeout(
        collector.collect(),
        this.sourceTimeoutMs,
        `${collector.kind} collection`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn('Source timed out', { timeoutMs: this.sourceTimeoutMs });
      } else {
        logger.error('Source collection rejected', toError(error));
      }
      return sentinelRecordFor(collector.kind, 'failed');
    }
  }
}
