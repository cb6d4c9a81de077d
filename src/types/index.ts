/**
 * Central export point for all type definitions
 */

export {
  type CollectionMethod,
  createSentinelRecord,
  createSnapshot,
  type DiscourseMetrics,
  type DiscourseRecord,
  type GitHubOrgMetrics,
  type GitHubOrgRecord,
  type GitHubRepoMetrics,
  type GitHubRepoRecord,
  metricFields,
  type MetricsOf,
  type PyPIMetrics,
  type PyPIRecord,
  type ScholarMetrics,
  type ScholarRecord,
  SENTINEL_METRICS,
  sentinelRecordFor,
  type SlackMetrics,
  type SlackRecord,
  type Snapshot,
  SOURCE_KINDS,
  type SourceKind,
  type SourceMetricsMap,
  type SourceRecord,
  type SourceRecordMap,
  type SourceRecordOf,
  type SourceStatus,
  type YouTubeMetrics,
  type YouTubeRecord
} from './records';

export {
  type ExtractionResult,
  type FieldPlan,
  type FieldType,
  type Matcher
} from './extraction';
