import axios, { type AxiosInstance, type AxiosResponse, type ResponseType } from 'axios';
import { BaseError } from './errors';
import { getLogger, type Logger } from './logger';
import { retry, RetryPolicies } from './retry';

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';
const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

export class HttpRequestError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string
  ) {
    super(`HTTP ${method} ${url} failed with ${status} ${statusText}`, {
      url,
      status,
      statusText,
      method
    });
  }
}

export interface HttpClientOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Retries after the first attempt; capped at one */
  retries?: number;
  /** Base delay before the retry */
  retryDelayMs?: number;
  userAgent?: string;
  logger?: Logger;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | null | undefined>;
}

function compactQuery(
  query?: HttpRequestOptions['query']
): Record<string, string | number | boolean> | undefined {
  if (!query) {
    return undefined;
  }

  const params: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    params[key] = value;
  }
  return params;
}

/**
 * Shared HTTP client for every collector: one timeout, at most one retry.
 */
export class HttpClient {
  /** Per-request deadline, shared with clients that do not go through axios */
  readonly timeoutMs: number;
  private readonly client: AxiosInstance;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = axios.create({
      timeout: this.timeoutMs,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        'Accept-Language': DEFAULT_ACCEPT_LANGUAGE
      },
      validateStatus: () => true
    });
    this.maxAttempts = 1 + Math.min(Math.max(options.retries ?? 1, 0), 1);
    this.retryDelayMs = options.retryDelayMs ?? RetryPolicies.single.initialDelay;
    this.logger = options.logger ?? getLogger();
  }

  /**
   * GET a JSON document. The payload is returned unvalidated.
   */
  async getJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
    const response = await this.request<unknown>(url, 'json', {
      ...options,
      headers: { Accept: 'application/json', ...options.headers }
    });
    return response.data;
  }

  /**
   * GET a text document, typically an HTML page to scrape
   */
  async getText(url: string, options: HttpRequestOptions = {}): Promise<string> {
    const response = await this.request<string>(url, 'text', {
      ...options,
      headers: {
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        ...options.headers
      }
    });
    return typeof response.data === 'string' ? response.data : String(response.data);
  }

  private async request<T>(
    url: string,
    responseType: ResponseType,
    options: HttpRequestOptions
  ): Promise<AxiosResponse<T>> {
    return retry(
      async () => {
        const started = Date.now();
        try {
          const response = await this.client.get<T>(url, {
            params: compactQuery(options.query),
            headers: options.headers,
            responseType
          });
          this.logger.logRequest('GET', url, Date.now() - started, response.status);

          if (response.status < 200 || response.status >= 300) {
            throw new HttpRequestError(url, response.status, response.statusText, 'GET');
          }
          return response;
        } catch (error) {
          if (!(error instanceof HttpRequestError)) {
            this.logger.logRequest(
              'GET',
              url,
              Date.now() - started,
              undefined,
              error instanceof Error ? error : undefined
            );
          }
          throw error;
        }
      },
      {
        ...RetryPolicies.single,
        maxAttempts: this.maxAttempts,
        initialDelay: this.retryDelayMs,
        onRetry: (attempt, error, delay) => {
          this.logger.debug(`Retrying GET ${url}`, {
            attempt,
            delay,
            status: error.status,
            code: error.code
          });
        }
      }
    );
  }
}
