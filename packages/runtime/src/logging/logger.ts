// Diagnostics logging

import { pino } from 'pino';
import type { DestinationStream, Level } from 'pino';

/**
 * Structured logger interface.
 * Implementations can route to pino, a test buffer, or nowhere.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = Level | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export type PinoLoggerOptions = {
  level?: LogLevel;
  name?: string;

  /**
   * Where log lines go. Defaults to stdout.
   */
  destination?: DestinationStream;
};

/**
 * Create a Logger that writes JSON lines through pino.
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger({ level: 'debug', name: 'authz' });
 * logger.info('Policies loaded', { count: 12 });
 * ```
 */
export function createPinoLogger(options: PinoLoggerOptions = {}): Logger {
  const pinoOptions = { level: options.level ?? 'info', name: options.name ?? 'tessera' };
  const base = options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);

  return {
    debug(message, data) {
      base.debug(data ?? {}, message);
    },
    info(message, data) {
      base.info(data ?? {}, message);
    },
    warn(message, data) {
      base.warn(data ?? {}, message);
    },
    error(message, data) {
      base.error(data ?? {}, message);
    },
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
};

export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({ level, message, data });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
