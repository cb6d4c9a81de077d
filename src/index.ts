#!/usr/bin/env node

/**
 * Main entry point for the community metrics collection run
 *
 * Runs must be serialized by whatever schedules them: the history store
 * assumes a single writer.
 */

import * as path from 'node:path';
import { createCollectors } from './collectors';
import { config, type MetricsSettings } from './config';
import { HistoryStore, type LatestDocument } from './history';
import { MetricsAggregator } from './orchestrator';
import type { Snapshot } from './types';
import { BaseError, toError } from './utils/errors';
import { HttpClient } from './utils/http';
import { getLogger, Logger } from './utils/logger';

export interface RunResult {
  snapshot: Snapshot;
  latest: LatestDocument;
}

export interface RunDependencies {
  http?: HttpClient;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Collect every enabled source once and persist the snapshot
 */
export async function collectMetrics(
  settings: MetricsSettings,
  dependencies: RunDependencies = {}
): Promise<RunResult> {
  const logger = dependencies.logger ?? getLogger();
  const { collection, output } = settings;

  const http =
    dependencies.http ??
    new HttpClient({
      timeoutMs: collection.request_timeout_ms,
      retries: collection.retries,
      logger
    });

  const aggregator = new MetricsAggregator({
    concurrency: collection.concurrency,
    sourceTimeoutMs: collection.source_timeout_ms,
    runBudgetMs: collection.run_budget_ms,
    logger,
    now: dependencies.now
  });

  const store = new HistoryStore({
    dir: path.resolve(output.dir),
    historyFile: output.history_file,
    latestFile: output.latest_file,
    growthWindowDays: collection.growth_window_days,
    logger
  });

  const snapshot = await aggregator.aggregate(createCollectors(settings.sources, http, logger));
  const latest = await store.persist(snapshot);

  logSummary(logger, snapshot);
  return { snapshot, latest };
}

function logSummary(logger: Logger, snapshot: Snapshot): void {
  const sources: Record<string, string> = {};
  for (const [kind, record] of Object.entries(snapshot.sources)) {
    if (record) {
      sources[kind] = record.method ? `${record.status} (${record.method})` : record.status;
    }
  }
  logger.info('Collection run summary', {
    timestamp: snapshot.timestamp.toISOString(),
    sources
  });
}

/**
 * Main execution function; resolves to the process exit code
 */
async function main(configPath?: string): Promise<number> {
  const logger = getLogger();

  try {
    const settings = await config.load(configPath);
    logger.setLogLevel(Logger.parseLogLevel(settings.logLevel));
    config.logConfig(logger);

    await collectMetrics(settings, { logger });
    return 0;
  } catch (error) {
    const failure = toError(error);
    logger.error(
      'Collection run failed',
      failure,
      failure instanceof BaseError ? { details: failure.toJSON() } : undefined
    );
    return 1;
  }
}

// Run if this is the main module
if (require.main === module) {
  process.on('unhandledRejection', (reason) => {
    getLogger().error('Unhandled rejection', toError(reason));
    process.exit(1);
  });

  main(process.argv[2]).then(
    (code) => process.exit(code),
    (error: unknown) => {
      getLogger().error('Unexpected error', toError(error));
      process.exit(1);
    }
  );
}

export { main };
