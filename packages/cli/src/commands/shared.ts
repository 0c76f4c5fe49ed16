/**
 * Helpers shared by the commands
 */

import chalk from 'chalk';
import {
  formatErrorDetails,
  getUserFriendlyMessage,
  loadConfig,
  type AppConfig,
  type AppConfigInput,
} from '@reelscope/core';

export interface ConfigOptions {
  config?: string;
}

/**
 * Load the configuration for a command; flags win over file and environment
 */
export function loadCommandConfig(options: ConfigOptions, overrides: Partial<AppConfigInput> = {}): AppConfig {
  return loadConfig({ configPath: options.config, overrides });
}

/**
 * Print an error for the operator and mark the process as failed
 */
export function reportError(error: unknown, verbose = false): void {
  console.error(chalk.red(`Error: ${getUserFriendlyMessage(error)}`));

  if (verbose) {
    const details = formatErrorDetails(error);
    if (details.code) console.error(chalk.gray(`Code: ${details.code}`));
    if (details.cause) console.error(chalk.gray(`Cause: ${details.cause}`));
    if (details.stack) console.error(chalk.gray(details.stack));
  }

  process.exitCode = 1;
}

/**
 * Parse a positive integer flag
 */
export function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new Error(`Expected a whole number, got "${value}"`);
  }
  return parsed;
}
