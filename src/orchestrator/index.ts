/**
 * Central export point for orchestrator modules
 */

export {
  DEFAULT_CONCURRENCY,
  DEFAULT_RUN_BUDGET_MS,
  DEFAULT_SOURCE_TIMEOUT_MS,
  MetricsAggregator,
  type MetricsAggregatorOptions
} from './metrics-aggregator';
