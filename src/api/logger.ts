/**
 * Namespaced console logger with a level threshold.
 *
 * The threshold comes from LOG_LEVEL (debug | info | warn | error, default info)
 * and is read when the logger is created.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Logger interface */
export interface Logger {
  namespace: string;
  level: LogLevel;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Parses a level name, falling back to info for anything unrecognized.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
}

/**
 * Creates a namespaced logger.
 */
export function createLogger(namespace: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const formatMessage = (label: string, message: string, data?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${label}] [${namespace}]`;
    if (data) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    namespace,
    level,
    info(message: string, data?: Record<string, unknown>): void {
      if (enabled('info')) console.info(formatMessage('INFO', message, data));
    },
    warn(message: string, data?: Record<string, unknown>): void {
      if (enabled('warn')) console.warn(formatMessage('WARN', message, data));
    },
    error(message: string, data?: Record<string, unknown>): void {
      if (enabled('error')) console.error(formatMessage('ERROR', message, data));
    },
    debug(message: string, data?: Record<string, unknown>): void {
      if (enabled('debug')) console.debug(formatMessage('DEBUG', message, data));
    },
  };
}
