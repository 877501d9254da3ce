/**
 * Logger Abstraction
 *
 * Uses Strapi's logger once the app binds it during `register`, falls back to
 * console otherwise. This lets the agent layer run both inside Strapi and in
 * standalone scripts/tests.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for better parsing and analysis).
 */

import { randomUUID } from 'crypto';

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'agent_complete', 'evaluation_recorded') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In production (JSON mode), outputs as JSON.
   * In development, formats as readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Structured logger that stamps every line with a correlation ID.
 */
export interface ContextualLogger extends StructuredLogger {
  readonly correlationId: string;
}

/**
 * Fields attached to every line of a contextual logger.
 */
export interface LogContext {
  readonly correlationId: string;
  readonly [key: string]: string | number | boolean | undefined;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

/**
 * Logger bound by the Strapi `register` hook (winston under the hood).
 */
let boundSink: Logger | undefined;

/**
 * Routes all log output to the given sink (normally `strapi.log`).
 */
export function bindLogSink(sink: Logger): void {
  boundSink = sink;
}

/**
 * Restores console output. Used by tests.
 */
export function unbindLogSink(): void {
  boundSink = undefined;
}

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation that uses the bound Strapi logger when available,
 * falls back to console otherwise.
 */
export const logger: Logger = {
  info: (message: string) => (boundSink ? boundSink.info(message) : console.log(message)),
  warn: (message: string) => (boundSink ? boundSink.warn(message) : console.warn(message)),
  error: (message: string) => (boundSink ? boundSink.error(message) : console.error(message)),
  debug: (message: string) => (boundSink ? boundSink.debug(message) : console.log(message)),
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @param prefix - The prefix to add to all log messages
 * @returns A logger with the prefix prepended to all messages
 *
 * @example
 * const log = createPrefixedLogger('[Researcher]');
 * log.info('Starting research'); // logs: "[Researcher] Starting research"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string for development.
 */
function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[\[\]]/g, '').trim(),
    ...entry,
  });
}

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a structured logger for specific modules.
 * Supports both string messages and structured data objects.
 *
 * @example
 * const log = createStructuredLogger('[Workflow]');
 * log.structured('info', {
 *   event: 'agent_complete',
 *   role: 'researcher',
 *   durationMs: 1500,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short correlation ID for tracing one workflow run across logs.
 */
export function generateCorrelationId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

/**
 * Creates a structured logger that tags every line with `[cid]` and merges
 * the context fields into structured entries.
 *
 * @example
 * const log = createContextualLogger('[Workflow]', { correlationId: 'a1b2c3' });
 * log.info('Run started'); // "[Workflow] [a1b2c3] Run started"
 */
export function createContextualLogger(prefix: string, context: LogContext): ContextualLogger {
  const tagged = `${prefix} [${context.correlationId}]`;
  const base = createStructuredLogger(tagged);

  return {
    ...base,
    correlationId: context.correlationId,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      base.structured(level, { ...context, ...entry });
    },
  };
}
