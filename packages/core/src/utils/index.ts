/**
 * Utility exports for @reelscope/core
 */

// ID utilities
export { generatePrefixedId, createRunId } from './id.js';

// Timers
export { sleep } from './sleep.js';

// Retry
export {
  shouldRetry,
  calculateRetryDelay,
  withRetry,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
export type { BackoffStrategy, RetryConfig, WithRetryOptions } from './retry.js';

// Error utilities
export {
  isFatalError,
  formatError,
  formatErrorDetails,
  getUserFriendlyMessage,
} from './error-helpers.js';
