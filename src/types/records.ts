/**
 * Metric record type definitions
 * One tagged variant per source kind, plus the run-level Snapshot
 */

// ============================================================================
// SOURCE KINDS AND STATUS
// ============================================================================

export const SOURCE_KINDS = [
  'github_org',
  'github_repo',
  'youtube',
  'scholar',
  'slack',
  'pypi',
  'discourse',
] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

/**
 * Outcome of one collection attempt for a source
 */
export type SourceStatus = 'ok' | 'partial' | 'failed' | 'disabled';

/**
 * How the values were obtained; empty when nothing was
 */
export type CollectionMethod = 'api' | 'scrape' | '';

// ============================================================================
// PER-SOURCE METRICS
// ============================================================================

export interface GitHubOrgMetrics {
  repo_count: number;
  stars: number;
  forks: number;
  contributors: number;
  open_issues: number;
  open_prs: number;
  followers: number;
}

export interface GitHubRepoMetrics {
  stars: number;
  forks: number;
  watchers: number;
  contributors: number;
  open_issues: number;
  open_prs: number;
}

export interface YouTubeMetrics {
  subscribers: number;
  total_views: number;
  video_count: number;
  channel_url: string;
}

export interface ScholarMetrics {
  citations: number;
  h_index: number;
  i10_index: number;
  /** Profiles that yielded at least one value */
  profiles: number;
}

export interface SlackMetrics {
  members: number;
  bots: number;
}

export interface PyPIMetrics {
  downloads_last_day: number;
  downloads_last_week: number;
  downloads_last_month: number;
  latest_version: string;
}

export interface DiscourseMetrics {
  users: number;
  topics: number;
  posts: number;
  active_users_30d: number;
}

export interface SourceMetricsMap {
  github_org: GitHubOrgMetrics;
  github_repo: GitHubRepoMetrics;
  youtube: YouTubeMetrics;
  scholar: ScholarMetrics;
  slack: SlackMetrics;
  pypi: PyPIMetrics;
  discourse: DiscourseMetrics;
}

export type MetricsOf<K extends SourceKind> = SourceMetricsMap[K];

/**
 * Sentinel values for every metric field. Also the field registry: key order
 * here is column order in the history series.
 */
export const SENTINEL_METRICS: { readonly [K in SourceKind]: SourceMetricsMap[K] } = {
  github_org: {
    repo_count: 0,
    stars: 0,
    forks: 0,
    contributors: 0,
    open_issues: 0,
    open_prs: 0,
    followers: 0,
  },
  github_repo: {
    stars: 0,
    forks: 0,
    watchers: 0,
    contributors: 0,
    open_issues: 0,
    open_prs: 0,
  },
  youtube: {
    subscribers: 0,
    total_views: 0,
    video_count: 0,
    channel_url: '',
  },
  scholar: {
    citations: 0,
    h_index: 0,
    i10_index: 0,
    profiles: 0,
  },
  slack: {
    members: 0,
    bots: 0,
  },
  pypi: {
    downloads_last_day: 0,
    downloads_last_week: 0,
    downloads_last_month: 0,
    latest_version: '',
  },
  discourse: {
    users: 0,
    topics: 0,
    posts: 0,
    active_users_30d: 0,
  },
};

// ============================================================================
// SOURCE RECORDS
// ============================================================================

interface SourceRecordBase<K extends SourceKind> {
  kind: K;
  enabled: boolean;
  status: SourceStatus;
  method: CollectionMethod;
}

export type SourceRecordOf<K extends SourceKind> = SourceRecordBase<K> & SourceMetricsMap[K];

export type GitHubOrgRecord = SourceRecordOf<'github_org'>;
export type GitHubRepoRecord = SourceRecordOf<'github_repo'>;
export type YouTubeRecord = SourceRecordOf<'youtube'>;
export type ScholarRecord = SourceRecordOf<'scholar'>;
export type SlackRecord = SourceRecordOf<'slack'>;
export type PyPIRecord = SourceRecordOf<'pypi'>;
export type DiscourseRecord = SourceRecordOf<'discourse'>;

/**
 * Normalized metrics for one source within a Snapshot
 */
export type SourceRecord =
  | GitHubOrgRecord
  | GitHubRepoRecord
  | YouTubeRecord
  | ScholarRecord
  | SlackRecord
  | PyPIRecord
  | DiscourseRecord;

export type SourceRecordMap = Partial<Record<SourceKind, SourceRecord>>;

/**
 * One collection run, merged across every enabled source
 */
export interface Snapshot {
  readonly timestamp: Date;
  readonly sources: Readonly<SourceRecordMap>;
}

// ============================================================================
// UTILITIES
// ============================================================================

/**
 * Build a record holding only sentinel values
 */
export function createSentinelRecord<K extends SourceKind>(
  kind: K,
  status: SourceStatus,
  enabled = status !== 'disabled'
): SourceRecordOf<K> {
  return {
    kind,
    enabled,
    status,
    method: '',
    ...SENTINEL_METRICS[kind],
  };
}

type SentinelFactories = {
  readonly [K in SourceKind]: (status: SourceStatus, enabled: boolean) => SourceRecordOf<K>;
};

const SENTINEL_FACTORIES: SentinelFactories = {
  github_org: (status, enabled) => createSentinelRecord('github_org', status, enabled),
  github_repo: (status, enabled) => createSentinelRecord('github_repo', status, enabled),
  youtube: (status, enabled) => createSentinelRecord('youtube', status, enabled),
  scholar: (status, enabled) => createSentinelRecord('scholar', status, enabled),
  slack: (status, enabled) => createSentinelRecord('slack', status, enabled),
  pypi: (status, enabled) => createSentinelRecord('pypi', status, enabled),
  discourse: (status, enabled) => createSentinelRecord('discourse', status, enabled),
};

/**
 * Sentinel record for a kind only known at run time
 */
export function sentinelRecordFor(
  kind: SourceKind,
  status: SourceStatus,
  enabled = status !== 'disabled'
): SourceRecord {
  return SENTINEL_FACTORIES[kind](status, enabled);
}

/**
 * Metric field names of a source kind, in column order
 */
export function metricFields(kind: SourceKind): string[] {
  return Object.keys(SENTINEL_METRICS[kind]);
}

/**
 * Freeze a snapshot so it cannot be changed after construction
 */
export function createSnapshot(timestamp: Date, sources: SourceRecordMap): Snapshot {
  const frozenSources: SourceRecordMap = {};
  for (const kind of SOURCE_KINDS) {
    const record = sources[kind];
    if (record) {
      frozenSources[kind] = Object.freeze({ ...record });
    }
  }

  return Object.freeze({
    timestamp: new Date(timestamp.getTime()),
    sources: Object.freeze(frozenSources),
  });
}
