/**
 * Structured logging API.
 *
 * Every component logs through a pino root logger so that dispatcher
 * diagnostics, registration output and request-level messages share one
 * format and one level switch.
 *
 * Environment Variables:
 *   JUNCTION_LOG_LEVEL   - trace, debug, info, warn, error (default: "info")
 *   JUNCTION_LOG_PRETTY  - "true" to render through pino-pretty
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component/subsystem identifier (e.g., "dispatcher", "dispatch-type")
 * - operation: Operation being performed (e.g., "prepare_action")
 * - namespace: Action namespace
 * - action: Private path of an action
 * - error_message: Error message for error logs
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Logger with preset fields, as returned by createLogger().
 */
export interface Logger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

let rootLogger: PinoLogger | null = null;

function buildRootLogger(): PinoLogger {
  const options: LoggerOptions = {
    name: 'junction',
    level: process.env.JUNCTION_LOG_LEVEL ?? 'info',
  };

  if (process.env.JUNCTION_LOG_PRETTY === 'true') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(options);
}

/**
 * Get the root pino logger, creating it on first use.
 */
export function getRootLogger(): PinoLogger {
  if (!rootLogger) {
    rootLogger = buildRootLogger();
  }
  return rootLogger;
}

/**
 * Replace the root logger.
 *
 * Passing null drops the current logger; the next log call rebuilds it
 * from the environment.
 */
export function setRootLogger(logger: PinoLogger | null): void {
  rootLogger = logger;
}

/**
 * Change the root logger's level.
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

/**
 * Drop undefined values so they do not show up as keys in the output.
 */
function compactFields(fields?: LogFields): Record<string, string | number | boolean | null> {
  const result: Record<string, string | number | boolean | null> = {};
  if (!fields) {
    return result;
  }

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Log an ERROR level message with structured fields.
 *
 * @example
 * logError('Dispatch type failed to load', {
 *   component: 'dispatcher',
 *   dispatch_type: 'Chained',
 * });
 */
export function logError(message: string, fields?: LogFields): void {
  getRootLogger().error(compactFields(fields), message);
}

/**
 * Log a WARN level message with structured fields.
 */
export function logWarn(message: string, fields?: LogFields): void {
  getRootLogger().warn(compactFields(fields), message);
}

/**
 * Log an INFO level message with structured fields.
 */
export function logInfo(message: string, fields?: LogFields): void {
  getRootLogger().info(compactFields(fields), message);
}

/**
 * Log a DEBUG level message with structured fields.
 */
export function logDebug(message: string, fields?: LogFields): void {
  getRootLogger().debug(compactFields(fields), message);
}

/**
 * Log a TRACE level message with structured fields.
 *
 * Typically disabled in production.
 */
export function logTrace(message: string, fields?: LogFields): void {
  getRootLogger().trace(compactFields(fields), message);
}

export interface CreateLoggerOptions {
  /**
   * Level for this logger alone. Its lines go through a child of the root
   * logger, so the root level and other loggers are left as they are.
   */
  level?: LogLevel;
}

/**
 * Create a logger with preset fields.
 *
 * @example
 * const logger = createLogger({ component: 'dispatcher' });
 * logger.debug('Registered action', { action: 'blog/view' });
 * // Logs: { component: 'dispatcher', action: 'blog/view' }
 */
export function createLogger(defaultFields: LogFields, options: CreateLoggerOptions = {}): Logger {
  const mergeFields = (fields?: LogFields): LogFields => ({
    ...defaultFields,
    ...fields,
  });

  const { level } = options;
  if (level === undefined) {
    return {
      error: (message, fields) => logError(message, mergeFields(fields)),
      warn: (message, fields) => logWarn(message, mergeFields(fields)),
      info: (message, fields) => logInfo(message, mergeFields(fields)),
      debug: (message, fields) => logDebug(message, mergeFields(fields)),
      trace: (message, fields) => logTrace(message, mergeFields(fields)),
    };
  }

  // The root can be replaced at any time, so the child follows it
  let parent: PinoLogger | null = null;
  let child: PinoLogger | null = null;
  const target = (): PinoLogger => {
    const root = getRootLogger();
    if (root !== parent || !child) {
      parent = root;
      child = root.child({}, { level });
    }
    return child;
  };

  return {
    error: (message, fields) => target().error(compactFields(mergeFields(fields)), message),
    warn: (message, fields) => target().warn(compactFields(mergeFields(fields)), message),
    info: (message, fields) => target().info(compactFields(mergeFields(fields)), message),
    debug: (message, fields) => target().debug(compactFields(mergeFields(fields)), message),
    trace: (message, fields) => target().trace(compactFields(mergeFields(fields)), message),
  };
}
