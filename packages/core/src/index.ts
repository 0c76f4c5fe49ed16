/**
 * @reelscope/core
 *
 * Core types, metric schema, configuration, errors and utilities shared by
 * every Reelscope package.
 */

// Types
export * from './types/index.js';

// Errors
export {
  ReelscopeError,
  Errors,
  isReelscopeError,
  FATAL_ERROR_CODES,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Utilities
export * from './utils/index.js';

// Constants
export {
  DEFAULT_TIMEOUTS,
  MAX_RETRIES,
  RESPONSE_THRESHOLDS,
  COMPLETENESS_BOUNDS,
  STORE_LAYOUT,
} from './constants.js';

// Metric schema & prompt
export {
  CATEGORY_SEPARATOR,
  METRIC_CATEGORIES,
  METRIC_DEFINITIONS,
  METRIC_SCHEMA,
  parseMetricSchema,
  bareMetricName,
  createEmptyResult,
  fillRatio,
} from './metrics/metric-schema.js';
export type { MetricCategory, MetricDefinition, ExtractionResult } from './metrics/metric-schema.js';
export { buildAnalysisPrompt, DEFAULT_ANALYSIS_PROMPT } from './metrics/prompt.js';

// Configuration
export {
  AppConfigSchema,
  LOG_LEVELS,
  loadConfig,
  defaultConfig,
} from './config/app-config.js';
export type { AppConfig, AppConfigInput, LoadConfigOptions } from './config/app-config.js';
