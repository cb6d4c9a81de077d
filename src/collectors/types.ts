import type { MetricsOf, SourceKind, SourceRecord } from '../types';
import type { HttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';

/**
 * What the aggregator sees of a collector
 */
export interface SourceCollector {
  readonly kind: SourceKind;
  isEnabled(): boolean;
  /** Never rejects; failures come back as a `failed` record */
  collect(): Promise<SourceRecord>;
}

export type ApiAttemptName = 'authenticated' | 'public';

/**
 * One structured retrieval path. Resolving to undefined, or throwing, moves
 * the collector on to the next attempt.
 */
export interface ApiAttempt<K extends SourceKind> {
  name: ApiAttemptName;
  run(): Promise<MetricsOf<K> | undefined>;
}

/**
 * Values scraped from public pages, with how many of the required fields
 * were found.
 */
export interface ScrapeOutcome<K extends SourceKind> {
  values: Partial<MetricsOf<K>>;
  attempted: number;
  extracted: number;
}

export interface CollectorInit<S> {
  section: S;
  http: HttpClient;
  logger?: Logger;
}
