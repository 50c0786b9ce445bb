/**
 * Observability exports
 *
 * @module observability
 */

export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  formatLogLine,
  isLogLevel,
  logError,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
