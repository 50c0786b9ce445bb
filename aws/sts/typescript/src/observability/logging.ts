/**
 * Structured logging utilities for role assumption
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Console-based logger with structured output.
 *
 * Every level goes to stderr: stdout carries the module result document.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    console.error(formatLogLine(level, message, context));
  }
}

/**
 * Format a log line as `[timestamp] [LEVEL] message {context}`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date()
): string {
  const contextStr = context ? ` ${JSON.stringify(context)}` : '';
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

/**
 * No-op logger, the default when no logger is supplied
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Build a logger from a level name such as the value of an environment variable.
 *
 * Unset, empty, or unknown names produce a NoopLogger.
 */
export function createLogger(level: string | undefined): Logger {
  const normalized = level?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return new ConsoleLogger(normalized);
  }
  return new NoopLogger();
}

/**
 * Helper function to log a failed role assumption
 */
export function logError(logger: Logger, operation: string, error: Error): void {
  logger.error(`STS operation failed`, {
    operation,
    errorName: error.name,
    errorMessage: error.message,
  });
}
