import { extractFields, type FieldExtraction, TextPage } from '../extraction';
import {
  createSentinelRecord,
  type SourceKind,
  type SourceRecordOf
} from '../types';
import type { FieldPlan } from '../types/extraction';
import { describeError, toError } from '../utils/errors';
import type { HttpClient, HttpRequestOptions } from '../utils/http';
import { getLogger, type Logger } from '../utils/logger';
import type {
  ApiAttempt,
  CollectorInit,
  ScrapeOutcome
} from './types';

interface SectionBase {
  enabled: boolean;
}

/**
 * Template for every source: structured API attempts in preference order,
 * then a scrape of public pages, all behind a boundary that never throws.
 */
export abstract class AbstractSourceCollector<K extends SourceKind, S extends SectionBase> {
  abstract readonly kind: K;
  protected readonly section: S;
  protected readonly http: HttpClient;
  private readonly baseLogger: Logger;
  private scopedLogger?: Logger;

  constructor({ section, http, logger }: CollectorInit<S>) {
    this.section = section;
    this.http = http;
    this.baseLogger = logger ?? getLogger();
  }

  protected get logger(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = this.baseLogger.forSource(this.kind);
    }
    return this.scopedLogger;
  }

  isEnabled(): boolean {
    return this.section.enabled;
  }

  /**
   * Structured attempts to try, most preferred first
   */
  protected abstract apiAttempts(): ApiAttempt<K>[];

  /**
   * Scrape fallback; undefined when the source has no public page
   */
  protected abstract scrape(): Promise<ScrapeOutcome<K> | undefined>;

  async collect(): Promise<SourceRecordOf<K>> {
    return this.finalize(await this.collectRecord());
  }

  /**
   * Last touch on every record, whatever path produced it
   */
  protected finalize(record: SourceRecordOf<K>): SourceRecordOf<K> {
    return record;
  }

  private async collectRecord(): Promise<SourceRecordOf<K>> {
    if (!this.isEnabled()) {
      return createSentinelRecord(this.kind, 'disabled', false);
    }

    try {
      for (const attempt of this.apiAttempts()) {
        const metrics = await this.runAttempt(attempt);
        if (metrics) {
          this.logger.info('Collected metrics from API', { attempt: attempt.name });
          return {
            ...createSentinelRecord(this.kind, 'ok'),
            ...metrics,
            method: 'api',
          };
        }
      }

      const outcome = await this.scrape();
      if (!outcome || outcome.extracted === 0) {
        this.logger.warn('No metrics retrieved', { scraped: outcome !== undefined });
        return createSentinelRecord(this.kind, 'failed');
      }

      const status = outcome.extracted >= outcome.attempted ? 'ok' : 'partial';
      this.logger.info('Collected metrics by scraping', {
        status,
        extracted: outcome.extracted,
        attempted: outcome.attempted,
      });
      return {
        ...createSentinelRecord(this.kind, status),
        ...outcome.values,
        method: 'scrape',
      };
    } catch (error) {
      this.logger.error('Collection failed', toError(error), { source: this.kind });
      return createSentinelRecord(this.kind, 'failed');
    }
  }

  private async runAttempt(attempt: ApiAttempt<K>) {
    try {
      const metrics = await attempt.run();
      if (!metrics) {
        this.logger.warn('API attempt returned no usable payload', { attempt: attempt.name });
      }
      return metrics;
    } catch (error) {
      this.logger.warn('API attempt failed', {
        attempt: attempt.name,
        error: describeError(error),
      });
      return undefined;
    }
  }

  /**
   * Fetch one public page and run a field plan over it
   */
  protected async scrapePage<F extends string>(
    url: string,
    plan: FieldPlan<F>,
    options?: HttpRequestOptions
  ): Promise<FieldExtraction<F>> {
    const text = await this.http.getText(url, options);
    const extraction = extractFields(new TextPage(text, url), plan);

    for (const { field } of plan) {
      const result = extraction.results[field];
      if (result?.succeeded) {
        this.logger.debug('Field extracted', { field, strategy: result.strategyUsed, url });
      } else {
        this.logger.warn('Field not found on page', { field, url });
      }
    }
    return extraction;
  }
}
