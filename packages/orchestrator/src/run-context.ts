/**
 * Run context
 *
 * Everything one process run shares: configuration, logger, result store
 * and (once the upload phase needs it) the chat surface. Built once at
 * start-up and torn down explicitly.
 */

import {
  formatError,
  type AppConfig,
  type AutomationSurface,
  type TabularStore,
} from '@reelscope/core';
import { hasValidSession } from '@reelscope/chat-surface';
import { CsvResultStore } from '@reelscope/result-store';
import { createRunLogger, type RunLogger } from '@reelscope/run-logger';

export interface RunContext {
  readonly runId: string;
  readonly config: AppConfig;
  readonly logger: RunLogger;
  readonly store: TabularStore;
  surface?: AutomationSurface;
}

export interface CreateRunContextOptions {
  /** Mirror log entries to the terminal (default true) */
  console?: boolean;
  logger?: RunLogger;
  store?: TabularStore;
}

/**
 * Build the run context; opening the store applies any pending migration
 */
export async function createRunContext(
  config: AppConfig,
  options: CreateRunContextOptions = {}
): Promise<RunContext> {
  const logger =
    options.logger ??
    createRunLogger({
      logFile: config.logFile,
      minLevel: config.logLevel,
      console: options.console,
    });

  try {
    let store = options.store;
    if (!store) {
      const csvStore = await CsvResultStore.open({
        filePath: config.outputFile,
        logger: logger.child('result-store'),
      });
      if (csvStore.migration.kind !== 'none') {
        logger.info('Result store prepared', { ...csvStore.migration });
      }
      store = csvStore;
    }

    logger.info('Run started', {
      outputFile: config.outputFile,
      sessionPresent: hasValidSession(config.sessionFile),
    });

    return { runId: logger.runId, config, logger, store };
  } catch (error) {
    logger.error('Run context could not be created', { error: formatError(error) });
    await logger.close();
    throw error;
  }
}

/**
 * Close the chat surface (if any) and the logger
 */
export async function disposeRunContext(context: RunContext): Promise<void> {
  try {
    if (context.surface) {
      await context.surface.close();
      context.surface = undefined;
    }
  } finally {
    await context.logger.close();
  }
}
