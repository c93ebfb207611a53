/**
 * Centralized Logging Service
 * Provides structured logging with run tracing using bunyan
 */
import { randomUUID } from 'node:crypto';
import bunyan, { LogLevel } from 'bunyan';

/**
 * Log levels available (bunyan standard levels)
 * trace=10, debug=20, info=30, warn=40, error=50, fatal=60
 */
export type { LogLevel };

/**
 * Context bound to every line logged during one invocation
 */
export interface RunContext {
  runId: string;
  variant?: string;
}

/**
 * Service names for child loggers
 */
export type ServiceName = 'cli' | 'scraper' | 'fetcher' | 'exporter' | 'ics-generator';

export type Logger = bunyan;

const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is Extract<LogLevel, string> {
  return LOG_LEVELS.includes(value);
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
 * Error serializer that keeps the ScraperError fields
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

const rootLogger = bunyan.createLogger({
  name: 'calendario-academico',
  level: getLogLevel(),
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
});

/**
 * Create a logger scoped to a single CLI run
 *
 * @example
 * const log = createRunLogger({ runId: generateRunId() });
 * log.info('Run started');
 */
export function createRunLogger(context: RunContext): Logger {
  return rootLogger.child({
    runId: context.runId,
    variant: context.variant,
  });
}

/**
 * Create a service-specific child logger
 *
 * @example
 * const serviceLog = createServiceLogger(log, 'fetcher');
 * serviceLog.info({ url }, 'Fetching page');
 */
export function createServiceLogger(parentLogger: Logger, service: ServiceName): Logger {
  return parentLogger.child({ service });
}

export function generateRunId(): string {
  return randomUUID();
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

