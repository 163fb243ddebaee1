/**
 * Centralized Logging Service
 * Structured logging for pipeline stages using bunyan
 */
import bunyan, { LogLevel } from 'bunyan';

/**
 * Log levels available (bunyan standard levels)
 * trace=10, debug=20, info=30, warn=40, error=50, fatal=60
 */
export type { LogLevel };

/**
 * Service names for child loggers
 */
export type ServiceName =
  | 'cli'
  | 'calendar'
  | 'mapper'
  | 'fetcher'
  | 'enrichment'
  | 'title-fallback';

export type Logger = bunyan;

const VALID_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is bunyan.LogLevelString {
  return VALID_LEVELS.includes(value);
}

/**
 * Determine log level from environment
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();

  if (level && isLogLevel(level)) {
    return level;
  }

  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Error serializer that keeps the EnricherError fields
 */
function errorSerializer(err: Error & { code?: string; details?: unknown; retryable?: boolean }) {
  const serialized = bunyan.stdSerializers.err(err);
  return {
    ...serialized,
    code: err.code,
    details: err.details,
    retryable: err.retryable,
  };
}

/**
 * Root logger instance. Writes to stderr so `--print-only` output stays clean.
 */
const rootLogger = bunyan.createLogger({
  name: 'ics-enricher',
  level: getLogLevel(),
  stream: process.stderr,
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
});

/**
 * Create a service-specific child logger
 *
 * @example
 * const log = createServiceLogger(getRootLogger(), 'fetcher');
 * log.debug({ url }, 'Fetching page');
 */
export function createServiceLogger(parentLogger: Logger, service: ServiceName): Logger {
  return parentLogger.child({ service });
}

/**
 * Get the root logger for run-level logging
 */
export function getRootLogger(): Logger {
  return rootLogger;
}

/**
 * Elapsed milliseconds since `startTime`
 *
 * @example
 * const startTime = Date.now();
 * // ... operation ...
 * log.info({ durationMs: elapsed(startTime) }, 'Operation complete');
 */
export function elapsed(startTime: number): number {
  return Date.now() - startTime;
}

export default rootLogger;
