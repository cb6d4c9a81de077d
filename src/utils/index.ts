/**
 * Central export point for utility modules
 */

export {
  AggregationError,
  BaseError,
  ConfigurationError,
  describeError,
  PersistenceError,
  SourceError,
  TimeoutError,
  toError
} from './errors';
export {
  HttpClient,
  type HttpClientOptions,
  HttpRequestError,
  type HttpRequestOptions
} from './http';
export {
  getLogger,
  type LogContext,
  type LogEntry,
  Logger,
  LogLevel,
  type LogOutput
} from './logger';
export { defaultIsRetryable, retry, type RetryConfig, RetryPolicies } from './retry';
export { withTimeout } from './timeout';
