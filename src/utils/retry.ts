/**
 * Retry utility with exponential backoff and jitter
 */

export interface RetryableError {
  code?: string;
  status?: number;
  message?: string;
}

export interface RetryConfig {
  /** Maximum number of attempts, first call included */
  maxAttempts?: number;
  /** Initial delay in milliseconds */
  initialDelay?: number;
  /** Maximum delay in milliseconds */
  maxDelay?: number;
  /** Backoff factor (2 = double delay each time) */
  factor?: number;
  /** Add random jitter to delays (0-1, 0 = no jitter, 1 = up to 100% jitter) */
  jitter?: number;
  isRetryable?: (error: RetryableError) => boolean;
  onRetry?: (attempt: number, error: RetryableError, nextDelay: number) => void;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN']);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

function toRetryableError(error: unknown): RetryableError {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  const message = error instanceof Error ? error.message : undefined;
  return { code, status, message };
}

/**
 * Network resets, timeouts, rate limits and gateway errors are worth a second try
 */
export function defaultIsRetryable(error: RetryableError): boolean {
  if (error.code && RETRYABLE_CODES.has(error.code)) {
    return true;
  }

  if (error.status !== undefined && RETRYABLE_STATUSES.has(error.status)) {
    return true;
  }

  return error.message?.toLowerCase().includes('rate limit') ?? false;
}

function calculateDelay(attempt: number, config: Required<RetryConfig>): number {
  let delay = Math.min(config.initialDelay * config.factor ** (attempt - 1), config.maxDelay);

  if (config.jitter > 0) {
    const jitterAmount = delay * config.jitter * Math.random();
    delay = delay - jitterAmount / 2 + jitterAmount;
  }

  return Math.round(delay);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff
 */
export async function retry<T>(fn: () => Promise<T>, config: RetryConfig = {}): Promise<T> {
  const finalConfig: Required<RetryConfig> = {
    maxAttempts: config.maxAttempts ?? 2,
    initialDelay: config.initialDelay ?? 500,
    maxDelay: config.maxDelay ?? 5000,
    factor: config.factor ?? 2,
    jitter: config.jitter ?? 0.2,
    isRetryable: config.isRetryable ?? defaultIsRetryable,
    onRetry: config.onRetry ?? (() => undefined)
  };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const details = toRetryableError(error);

      if (attempt >= finalConfig.maxAttempts || !finalConfig.isRetryable(details)) {
        throw error;
      }

      const delay = calculateDelay(attempt, finalConfig);
      finalConfig.onRetry(attempt, details, delay);
      await sleep(delay);
    }
  }
}

/**
 * Pre-configured retry policies
 */
export const RetryPolicies = {
  /** One retry, the ceiling for any outbound metrics request */
  single: {
    maxAttempts: 2,
    initialDelay: 500,
    maxDelay: 2000,
    factor: 2,
    jitter: 0.2
  } satisfies RetryConfig,

  none: {
    maxAttempts: 1
  } satisfies RetryConfig
};
