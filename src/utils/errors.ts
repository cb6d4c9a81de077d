/**
 * Custom error classes and error handling utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Error raised inside a source collector. Collectors catch it at their own
 * boundary and downgrade the source to `failed`.
 */
export class SourceError extends BaseError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Source ${source} error: ${message}`, {
      source,
      originalError: describeError(originalError)
    });
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields
    });
  }
}

/**
 * Error thrown before collection starts when there is nothing to collect
 */
export class AggregationError extends BaseError {
  constructor(message: string) {
    super(`Aggregation error: ${message}`);
  }
}

/**
 * Error thrown when the history store cannot be written
 */
export class PersistenceError extends BaseError {
  constructor(
    public readonly path: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Persistence of ${path} failed: ${message}`, {
      path,
      originalError: describeError(originalError)
    });
  }
}

/**
 * Error thrown when an operation runs past its deadline
 */
export class TimeoutError extends BaseError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

/**
 * Coerce a thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * Short human readable description of a thrown value
 */
export function describeError(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
