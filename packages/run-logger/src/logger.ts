/**
 * Run Logger Implementation
 *
 * Component-scoped structured logging for a pipeline run. Writing is
 * synchronous; transports are flushed and closed at teardown.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { Errors, createRunId, formatError } from '@reelscope/core';
import type {
  LogEntry,
  LogLevel,
  LogStats,
  LogTransport,
  Logger,
  RunLoggerConfig,
} from './types.js';
import { LOG_LEVEL_ORDER } from './types.js';

/**
 * In-memory transport for development/testing
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';
  private entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  async flush(): Promise<void> {
    // No-op for memory transport
  }

  async close(): Promise<void> {
    // No-op for memory transport
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Messages in write order, optionally filtered by level */
  messages(level?: LogLevel): string[] {
    return this.entries
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Console transport for the operator's terminal
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  write(entry: LogEntry): void {
    const line = `${this.getLevelPrefix(entry.level)} ${chalk.gray(entry.component)} ${entry.message}`;
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  async flush(): Promise<void> {
    // No-op for console transport
  }

  async close(): Promise<void> {
    // No-op for console transport
  }

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case 'error': return chalk.red('[ERROR]');
      case 'warn': return chalk.yellow('[WARN]');
      case 'info': return chalk.blue('[INFO]');
      case 'debug': return chalk.gray('[DEBUG]');
    }
  }
}

/**
 * Appends one JSON line per entry to a log file
 *
 * The file is opened synchronously so an unusable path fails at start-up.
 * A later write error disables the transport and is reported once on stderr.
 */
export class FileTransport implements LogTransport {
  readonly name = 'file';
  private readonly stream: fs.WriteStream;
  private closed = false;
  private failure: Error | null = null;

  constructor(readonly filePath: string) {
    let fd: number;
    try {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
      fd = fs.openSync(filePath, 'a');
    } catch (error) {
      throw Errors.configuration(`Cannot open log file: ${path.resolve(filePath)}`, {
        reason: formatError(error),
      });
    }

    this.stream = fs.createWriteStream(filePath, { fd });
    this.stream.on('error', error => this.fail(error));
  }

  /** The write error that disabled this transport, if any */
  get error(): Error | null {
    return this.failure;
  }

  write(entry: LogEntry): void {
    if (this.closed || this.failure) return;
    this.stream.write(`${formatLogLine(entry)}\n`);
  }

  async flush(): Promise<void> {
    if (this.closed || this.failure) return;
    await new Promise<void>(resolve => this.stream.write('', () => resolve()));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.failure) return;
    await new Promise<void>(resolve => {
      this.stream.once('close', () => resolve());
      this.stream.end();
    });
  }

  private fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    console.error(chalk.red(`[ERROR] Log file disabled (${this.filePath}): ${error.message}`));
    this.stream.destroy();
  }
}

/**
 * Serialize an entry as a single JSON line
 */
export function formatLogLine(entry: LogEntry): string {
  return JSON.stringify({
    time: entry.timestamp.toISOString(),
    runId: entry.runId,
    level: entry.level,
    component: entry.component,
    message: entry.message,
    ...(entry.context ? { context: entry.context } : {}),
  });
}

/**
 * Shared state behind a root logger and its children
 */
interface LoggerCore {
  runId: string;
  minLevel: LogLevel;
  transports: LogTransport[];
  stats: LogStats;
}

/**
 * Run Logger class
 */
export class RunLogger implements Logger {
  readonly component: string;
  private readonly core: LoggerCore;

  constructor(config: RunLoggerConfig = {}, core?: LoggerCore) {
    this.component = config.component ?? 'pipeline';
    this.core = core ?? {
      runId: config.runId ?? createRunId(),
      minLevel: config.minLevel ?? 'info',
      transports: [],
      stats: initializeStats(),
    };
  }

  get runId(): string {
    return this.core.runId;
  }

  /**
   * Add a transport to the logger
   */
  addTransport(transport: LogTransport): void {
    this.core.transports.push(transport);
  }

  /**
   * Remove a transport by name
   */
  removeTransport(name: string): boolean {
    const index = this.core.transports.findIndex(t => t.name === name);
    if (index >= 0) {
      this.core.transports.splice(index, 1);
      return true;
    }
    return false;
  }

  child(component: string): RunLogger {
    return new RunLogger({ component }, this.core);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.core.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      runId: this.core.runId,
      timestamp: new Date(),
      level,
      component: this.component,
      message,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    this.updateStats(entry);
    for (const transport of this.core.transports) {
      transport.write(entry);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Flush all transports
   */
  async flush(): Promise<void> {
    for (const transport of this.core.transports) {
      await transport.flush();
    }
  }

  /**
   * Flush and close all transports
   */
  async close(): Promise<void> {
    await this.flush();
    for (const transport of this.core.transports) {
      await transport.close();
    }
  }

  /**
   * Get log statistics for the whole run
   */
  getStats(): LogStats {
    return {
      totalEntries: this.core.stats.totalEntries,
      entriesByLevel: { ...this.core.stats.entriesByLevel },
      entriesByComponent: { ...this.core.stats.entriesByComponent },
    };
  }

  private updateStats(entry: LogEntry): void {
    const stats = this.core.stats;
    stats.totalEntries++;
    stats.entriesByLevel[entry.level]++;
    stats.entriesByComponent[entry.component] = (stats.entriesByComponent[entry.component] ?? 0) + 1;
  }
}

function initializeStats(): LogStats {
  return {
    totalEntries: 0,
    entriesByLevel: { debug: 0, info: 0, warn: 0, error: 0 },
    entriesByComponent: {},
  };
}

/**
 * Options for the standard run logger
 */
export interface CreateRunLoggerOptions extends RunLoggerConfig {
  /** Append JSON lines to this file */
  logFile?: string;
  /** Mirror entries to the terminal (default true) */
  console?: boolean;
}

/**
 * Create a run logger with console and file transports
 */
export function createRunLogger(options: CreateRunLoggerOptions = {}): RunLogger {
  const logger = new RunLogger(options);
  if (options.console ?? true) {
    logger.addTransport(new ConsoleTransport());
  }
  if (options.logFile) {
    logger.addTransport(new FileTransport(options.logFile));
  }
  return logger;
}

/**
 * Create a logger that records entries in memory only (for testing)
 */
export function createTestRunLogger(
  config: RunLoggerConfig = {}
): { logger: RunLogger; transport: MemoryTransport } {
  const logger = new RunLogger({ minLevel: 'debug', ...config });
  const transport = new MemoryTransport();
  logger.addTransport(transport);
  return { logger, transport };
}
