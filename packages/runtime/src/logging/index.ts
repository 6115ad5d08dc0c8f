export {
  createPinoLogger,
  createCapturingLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type PinoLoggerOptions,
} from './logger.js';
