/**
 * @reelscope/run-logger
 *
 * Structured per-run logging for the Reelscope pipeline.
 */

// Types
export type {
  LogLevel,
  LogEntry,
  LogTransport,
  RunLoggerConfig,
  LogStats,
  Logger,
} from './types.js';

export { LOG_LEVEL_ORDER } from './types.js';

// Logger
export {
  RunLogger,
  MemoryTransport,
  ConsoleTransport,
  FileTransport,
  formatLogLine,
  createRunLogger,
  createTestRunLogger,
} from './logger.js';
export type { CreateRunLoggerOptions } from './logger.js';
