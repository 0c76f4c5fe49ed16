/**
 * Application configuration
 *
 * Defaults, then an optional JSON config file, then REELSCOPE_* environment
 * variables, then explicit overrides (CLI flags). The merged object is
 * validated with zod.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  DEFAULT_TIMEOUTS,
  MAX_RETRIES,
  RESPONSE_THRESHOLDS,
} from '../constants.js';
import { Errors } from '../errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const booleanish = z.preprocess(value => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  return value;
}, z.boolean());

export const AppConfigSchema = z.object({
  // Files
  inputFile: z.string().min(1).default('data.csv'),
  inputKeyColumn: z.string().min(1).default('url'),
  outputFile: z.string().min(1).default('output.csv'),
  downloadsDir: z.string().min(1).default('downloads'),
  sessionFile: z.string().min(1).default('.session-state.json'),
  logFile: z.string().min(1).default('reelscope.log'),
  logLevel: z.enum(LOG_LEVELS).default('info'),

  // Chat surface
  chatUrl: z.string().url().default('https://chat.example.com/'),
  prompt: z.string().min(1).optional(),
  headless: booleanish.default(false),
  slowMoMs: nonNegativeInt.default(100),
  browserChannel: z.string().min(1).optional(),
  navigationTimeoutMs: positiveInt.default(DEFAULT_TIMEOUTS.NAVIGATION),

  // Polling and classification
  pollIntervalMs: positiveInt.default(DEFAULT_TIMEOUTS.POLL_INTERVAL),
  maxPolls: positiveInt.default(RESPONSE_THRESHOLDS.MAX_POLLS),
  stablePollsRequired: positiveInt.default(RESPONSE_THRESHOLDS.STABLE_POLLS),
  pageSettleMs: nonNegativeInt.default(DEFAULT_TIMEOUTS.PAGE_SETTLE),
  uploadSettleMs: nonNegativeInt.default(DEFAULT_TIMEOUTS.UPLOAD_SETTLE),

  // Retry and pacing
  maxRetries: nonNegativeInt.default(MAX_RETRIES.UPLOAD),
  streamingMaxRetries: nonNegativeInt.default(MAX_RETRIES.UPLOAD_STREAMING),
  maxDownloadAttempts: positiveInt.default(MAX_RETRIES.DOWNLOAD),
  interItemDelayMs: nonNegativeInt.default(DEFAULT_TIMEOUTS.INTER_ITEM_DELAY),
  downloadDelayMs: nonNegativeInt.default(DEFAULT_TIMEOUTS.DOWNLOAD_DELAY),
  downloadTimeoutMs: positiveInt.default(DEFAULT_TIMEOUTS.DOWNLOAD),

  // Batch streaming mode
  batchSize: positiveInt.optional(),
  deleteAfterUpload: booleanish.default(true),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Environment variable for each config key
 */
const ENV_KEYS: Record<keyof AppConfig, string> = {
  inputFile: 'REELSCOPE_INPUT_FILE',
  inputKeyColumn: 'REELSCOPE_INPUT_KEY_COLUMN',
  outputFile: 'REELSCOPE_OUTPUT_FILE',
  downloadsDir: 'REELSCOPE_DOWNLOADS_DIR',
  sessionFile: 'REELSCOPE_SESSION_FILE',
  logFile: 'REELSCOPE_LOG_FILE',
  logLevel: 'REELSCOPE_LOG_LEVEL',
  chatUrl: 'REELSCOPE_CHAT_URL',
  prompt: 'REELSCOPE_PROMPT',
  headless: 'REELSCOPE_HEADLESS',
  slowMoMs: 'REELSCOPE_SLOW_MO_MS',
  browserChannel: 'REELSCOPE_BROWSER_CHANNEL',
  navigationTimeoutMs: 'REELSCOPE_NAVIGATION_TIMEOUT_MS',
  pollIntervalMs: 'REELSCOPE_POLL_INTERVAL_MS',
  maxPolls: 'REELSCOPE_MAX_POLLS',
  stablePollsRequired: 'REELSCOPE_STABLE_POLLS',
  pageSettleMs: 'REELSCOPE_PAGE_SETTLE_MS',
  uploadSettleMs: 'REELSCOPE_UPLOAD_SETTLE_MS',
  maxRetries: 'REELSCOPE_MAX_RETRIES',
  streamingMaxRetries: 'REELSCOPE_STREAMING_MAX_RETRIES',
  maxDownloadAttempts: 'REELSCOPE_MAX_DOWNLOAD_ATTEMPTS',
  interItemDelayMs: 'REELSCOPE_INTER_ITEM_DELAY_MS',
  downloadDelayMs: 'REELSCOPE_DOWNLOAD_DELAY_MS',
  downloadTimeoutMs: 'REELSCOPE_DOWNLOAD_TIMEOUT_MS',
  batchSize: 'REELSCOPE_BATCH_SIZE',
  deleteAfterUpload: 'REELSCOPE_DELETE_AFTER_UPLOAD',
};

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Path to a JSON config file */
  configPath?: string;
  /** Values that win over every other source */
  overrides?: Partial<AppConfigInput>;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw Errors.inputNotFound(absolutePath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw Errors.configuration(`Config file is not valid JSON: ${absolutePath}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw Errors.configuration(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return { ...parsed };
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      values[key] = value;
    }
  }
  return values;
}

function withoutUndefined(values: Partial<AppConfigInput>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Load and validate the application configuration
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const merged = {
    ...(options.configPath ? readConfigFile(options.configPath) : {}),
    ...readEnv(options.env ?? process.env),
    ...withoutUndefined(options.overrides ?? {}),
  };

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw Errors.configuration(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Default configuration (no file, no environment)
 */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
