/**
 * Logging Module
 *
 * Structured JSON logging and warning throttling for the tracing pipeline.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  createLogger,
  createSilentLogger,
  isLogLevel,
} from './logger.js';

export {
  type ThrottleConfig,
  type ThrottledLogger,
  createThrottledLogger,
} from './throttle.js';
