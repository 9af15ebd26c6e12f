/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name, e.g. 'PullOrchestrator' */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

/**
 * Logger setting accepted by every sync component: options for a new
 * logger, an existing logger, or `false` to silence it.
 */
export type LoggerSetting = LoggerOptions | Logger | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Writes `ISO LEVEL[context] message {json}` lines to the console
 */
function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const line = `${new Date(entry.timestamp).toISOString()} ${entry.level.toUpperCase()}${prefix} ${entry.message}${
    entry.data ? ` ${JSON.stringify(entry.data)}` : ''
  }`;

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;
    handler({ level: logLevel, message, timestamp: Date.now(), context, data, error });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, error, data) => log('error', message, data, error),
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(setting: LoggerOptions | Logger): setting is Logger {
  return (
    'debug' in setting &&
    typeof setting.debug === 'function' &&
    'error' in setting &&
    typeof setting.error === 'function'
  );
}

/**
 * Turn a component's logger setting into a logger named after the component.
 *
 * An existing logger is used as is. Options get `context` filled in when
 * they do not name one.
 */
export function resolveLogger(setting: LoggerSetting | undefined, context: string): Logger {
  if (setting === false) return noopLogger;
  if (setting === undefined) return createLogger({ context });
  if (isLogger(setting)) return setting;
  return createLogger({ ...setting, context: setting.context ?? context });
}

/**
 * Normalize a caught value for `Logger.error`
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
