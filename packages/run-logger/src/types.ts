/**
 * Run Logger Types
 *
 * Structured log entries written for every pipeline run.
 */

/**
 * Log levels, lowest first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric ordering used for level filtering
 */
export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * A single log entry
 */
export interface LogEntry {
  /** Run that produced the entry */
  runId: string;
  timestamp: Date;
  level: LogLevel;
  /** Emitting component, e.g. "controller" or "store" */
  component: string;
  message: string;
  /** Structured context (item key, attempt, state, ...) */
  context?: Record<string, unknown>;
}

/**
 * Destination for log entries
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Logger configuration
 */
export interface RunLoggerConfig {
  /** Run identifier (generated when omitted) */
  runId?: string;
  /** Minimum level written to transports */
  minLevel?: LogLevel;
  /** Component name of the root logger */
  component?: string;
}

/**
 * Entry counts for the run summary
 */
export interface LogStats {
  totalEntries: number;
  entriesByLevel: Record<LogLevel, number>;
  entriesByComponent: Record<string, number>;
}

/**
 * Logging surface handed to pipeline components
 */
export interface Logger {
  readonly runId: string;
  readonly component: string;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger for a sub-component sharing transports and run id */
  child(component: string): Logger;
}
