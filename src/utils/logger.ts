/**
 * Structured JSON-line logger shared by a collection run. Child loggers keep
 * the run's correlation id and add the source or operation they work for.
 */

import { randomUUID } from 'node:crypto';

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Readonly<Record<LogLevel, string>> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

export interface LogContext {
  correlationId?: string;
  operation?: string;
  /** Source kind, set by `forSource` */
  source?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export type LogOutput = (entry: LogEntry) => void;

const writeJsonLine: LogOutput = (entry) => console.log(JSON.stringify(entry));

export class Logger {
  private static shared: Logger | undefined;
  readonly correlationId: string;
  private readonly context: LogContext;
  private readonly output: LogOutput;
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.INFO, context: LogContext = {}, output: LogOutput = writeJsonLine) {
    this.level = level;
    this.correlationId = context.correlationId ?? randomUUID();
    this.context = { ...context, correlationId: this.correlationId };
    this.output = output;
  }

  /**
   * Process-wide logger, created on first use at the `LOG_LEVEL` level
   */
  static getInstance(): Logger {
    if (!Logger.shared) {
      Logger.shared = new Logger(Logger.parseLogLevel(process.env.LOG_LEVEL));
    }
    return Logger.shared;
  }

  /** Unknown or missing names mean INFO */
  static parseLogLevel(level?: string): LogLevel {
    switch (level?.toLowerCase()) {
      case 'error':
        return LogLevel.ERROR;
      case 'warn':
        return LogLevel.WARN;
      case 'debug':
        return LogLevel.DEBUG;
      default:
        return LogLevel.INFO;
    }
  }

  child(context: LogContext): Logger {
    return new Logger(
      this.level,
      { ...this.context, ...context, correlationId: context.correlationId ?? this.correlationId },
      this.output
    );
  }

  forSource(source: string): Logger {
    return this.child({ source });
  }

  forOperation(operation: string, context?: LogContext): Logger {
    return this.child({ ...context, operation, operationId: randomUUID() });
  }

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, metadata, error);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, metadata);
  }

  /**
   * One line per outbound HTTP call: debug on success, warn on an error
   * status or a transport failure
   */
  logRequest(method: string, url: string, duration: number, status?: number, error?: Error): void {
    const metadata = {
      method,
      url,
      duration,
      status,
      success: !error && status !== undefined && status < 400,
    };

    if (error) {
      this.warn(`Request failed: ${method} ${url}`, { ...metadata, error: error.message });
    } else if (status !== undefined && status >= 400) {
      this.warn(`Request returned error status: ${method} ${url}`, metadata);
    } else {
      this.debug(`Request completed: ${method} ${url}`, metadata);
    }
  }

  /**
   * Returns a stop function that logs and returns the elapsed milliseconds
   */
  startTimer(operation: string): () => number {
    const start = Date.now();
    this.debug(`Starting operation: ${operation}`);

    return () => {
      const duration = Date.now() - start;
      this.info(`Operation completed: ${operation}`, { duration });
      return duration;
    };
  }

  private write(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level > this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      message,
      correlationId: this.correlationId,
      context: this.context,
    };
    if (metadata) {
      entry.metadata = metadata;
    }
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    this.output(entry);
  }
}

export function getLogger(): Logger {
  return Logger.getInstance();
}
