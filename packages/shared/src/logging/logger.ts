/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Where formatted lines are written. Defaults to the global console.
 */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  context?: Record<string, unknown>;
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a console logger.
 *
 * Lines look like `[2024-01-01T00:00:00.000Z] [INFO] [brdocs] message {"key":"value"}`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'brdocs';
  const baseContext = options.context ?? {};
  const sink = options.sink ?? console;

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= minLevel;

  const formatMessage = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const mergedContext = { ...baseContext, ...context };
    const contextStr = Object.keys(mergedContext).length > 0
      ? ` ${JSON.stringify(mergedContext)}`
      : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${prefix}] ${message}${contextStr}`;
  };

  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (shouldLog(level)) {
      sink[level](formatMessage(level, message, context));
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),

    child(context: Record<string, unknown>): Logger {
      const childOptions: LoggerOptions = {
        prefix,
        sink,
        context: { ...baseContext, ...context },
      };
      if (options.level !== undefined) {
        childOptions.level = options.level;
      }
      return createLogger(childOptions);
    },
  };
}

/**
 * Logger that drops everything. Used when callers pass none.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
