/**
 * Leveled console logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Logger that writes to console and drops anything below `level`
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>): boolean => LEVEL_ORDER[messageLevel] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(message, context ?? {});
    },
    info(message, context) {
      if (enabled('info')) console.info(message, context ?? {});
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(message, context ?? {});
    },
    error(message, context) {
      if (enabled('error')) console.error(message, context ?? {});
    }
  };
}

export const defaultLogger: Logger = createConsoleLogger('warn');
