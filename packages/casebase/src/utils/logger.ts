/**
 * Logging
 *
 * Components log through this interface; the default implementation
 * writes to the console with a level threshold.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for case memory components
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Prefix for every line (default: [casebase]) */
  prefix?: string;
}

/**
 * Create a console-backed logger
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.prefix ?? '[casebase]';
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    error: (message) => {
      if (enabled('error')) console.error(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) console.info(`${prefix} ${message}`);
    },
    debug: (message) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

/**
 * Render an unknown error for a log line
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
