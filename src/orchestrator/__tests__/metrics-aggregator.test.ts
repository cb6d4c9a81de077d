import type { SourceCollector } from '../../collectors/types';
import { createSentinelRecord, type SourceKind, type SourceRecord, sentinelRecordFor } from '../../types';
import { AggregationError } from '../../utils/errors';
import { type LogEntry, Logger, LogLevel } from '../../utils/logger';
import { MetricsAggregator } from '../metrics-aggregator';

const FIXED_TIME = new Date('2026-03-01T06:00:00.000Z');

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function stubCollector(
  kind: SourceKind,
  collect: () => Promise<SourceRecord>,
  enabled = true
): SourceCollector & { collect: jest.Mock<Promise<SourceRecord>, []> } {
  return { kind, isEnabled: () => enabled, collect: jest.fn(collect) };
}

const okPyPI = (): SourceRecord => ({
  ...createSentinelRecord('pypi', 'ok'),
  method: 'api',
  downloads_last_month: 4000
});

const okSlack = (): SourceRecord => ({
  ...createSentinelRecord('slack', 'ok'),
  method: 'api',
  members: 12
});

function buildAggregator(options: ConstructorParameters<typeof MetricsAggregator>[0] = {}, entries: LogEntry[] = []) {
  return new MetricsAggregator({
    logger: new Logger(LogLevel.DEBUG, {}, (entry) => entries.push(entry)),
    now: () => FIXED_TIME,
    ...options
  });
}

describe('MetricsAggregator', () => {
  it('returns one record per enabled collector and omits disabled ones', async () => {
    const disabled = stubCollector('youtube', () => Promise.resolve(createSentinelRecord('youtube', 'disabled')), false);

    const snapshot = await buildAggregator().aggregate([
      stubCollector('pypi', () => Promise.resolve(okPyPI())),
      disabled,
      stubCollector('slack', () => Promise.resolve(okSlack()))
    ]);

    expect(snapshot.timestamp).toEqual(FIXED_TIME);
    expect(Object.keys(snapshot.sources)).toEqual(['slack', 'pypi']);
    expect(snapshot.sources.pypi).toMatchObject({ status: 'ok', downloads_last_month: 4000 });
    expect(snapshot.sources.youtube).toBeUndefined();
    expect(disabled.collect).not.toHaveBeenCalled();
  });

  it('orders records by source kind regardless of completion order', async () => {
    const snapshot = await buildAggregator().aggregate([
      stubCollector('pypi', async () => {
        await delay(5);
        return okPyPI();
      }),
      stubCollector('slack', () => Promise.resolve(okSlack()))
    ]);

    expect(Object.keys(snapshot.sources)).toEqual(['slack', 'pypi']);
  });

  it('throws before collecting when nothing is enabled', async () => {
    const disabled = stubCollector('pypi', () => Promise.resolve(okPyPI()), false);

    await expect(buildAggregator().aggregate([disabled])).rejects.toBeInstanceOf(AggregationError);
    await expect(buildAggregator().aggregate([])).rejects.toThrow(
      'Aggregation error: No enabled sources configured'
    );
    expect(disabled.collect).not.toHaveBeenCalled();
  });

  it('records a source that exceeds its timeout as failed', async () => {
    const entries: LogEntry[] = [];
    const snapshot = await buildAggregator({ sourceTimeoutMs: 20 }, entries).aggregate([
      stubCollector('slack', () => new Promise<SourceRecord>(() => undefined)),
      stubCollector('pypi', () => Promise.resolve(okPyPI()))
    ]);

    expect(snapshot.sources.slack).toEqual(createSentinelRecord('slack', 'failed'));
    expect(snapshot.sources.pypi).toMatchObject({ status: 'ok' });
    expect(entries).toContainEqual(
      expect.objectContaining({
        level: 'WARN',
        message: 'Source timed out',
        metadata: { timeoutMs: 20 }
      })
    );
  });

  it('records a collector that rejects as failed without affecting the others', async () => {
    const snapshot = await buildAggregator().aggregate([
      stubCollector('slack', () => Promise.reject(new Error('unexpected'))),
      stubCollector('pypi', () => Promise.resolve(okPyPI()))
    ]);

    expect(snapshot.sources.slack).toMatchObject({ kind: 'slack', status: 'failed', method: '' });
    expect(snapshot.sources.pypi).toMatchObject({ status: 'ok' });
  });

  it('never runs more collectors at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const kinds: SourceKind[] = ['github_org', 'github_repo', 'youtube', 'scholar', 'slack'];
    const collectors = kinds.map((kind) =>
      stubCollector(kind, async () => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
        return sentinelRecordFor(kind, 'ok');
      })
    );

    const snapshot = await buildAggregator({ concurrency: 2 }).aggregate(collectors);

    expect(peak).toBe(2);
    expect(Object.keys(snapshot.sources)).toEqual(kinds);
  });

  it('abandons unfinished sources when the run budget runs out', async () => {
    const never = stubCollector('youtube', () => new Promise<SourceRecord>(() => undefined));
    const queued = stubCollector('pypi', () => Promise.resolve(okPyPI()));

    const snapshot = await buildAggregator({
      concurrency: 1,
      sourceTimeoutMs: 200,
      runBudgetMs: 30
    }).aggregate([stubCollector('slack', () => Promise.resolve(okSlack())), never, queued]);

    expect(snapshot.sources.slack).toMatchObject({ status: 'ok', members: 12 });
    expect(snapshot.sources.youtube).toEqual(createSentinelRecord('youtube', 'failed'));
    expect(snapshot.sources.pypi).toEqual(createSentinelRecord('pypi', 'failed'));
    expect(queued.collect).not.toHaveBeenCalled();
  });

  it('freezes the snapshot', async () => {
    const snapshot = await buildAggregator().aggregate([
      stubCollector('pypi', () => Promise.resolve(okPyPI()))
    ]);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.sources)).toBe(true);
    expect(Object.isFrozen(snapshot.sources.pypi)).toBe(true);
  });
});
