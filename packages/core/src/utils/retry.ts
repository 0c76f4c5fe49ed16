/**
 * Retry logic for pipeline steps
 *
 * Configurable retry behavior with backoff strategies. Sleeping goes through
 * an injectable function so callers and tests control time.
 */

import { isReelscopeError } from '../errors.js';
import type { SleepFn } from '../types/common.js';
import { sleep } from './sleep.js';

/**
 * Retry backoff strategy
 */
export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  backoffStrategy: BackoffStrategy;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  backoffStrategy: 'fixed',
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitter: false,
};

/**
 * Check if an error should be retried
 *
 * ReelscopeErrors carry their own retryable flag; any other error is retried
 * while attempts remain.
 */
export function shouldRetry(
  error: unknown,
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): boolean {
  if (attempt >= config.maxRetries) {
    return false;
  }

  if (isReelscopeError(error)) {
    return error.retryable;
  }

  return true;
}

/**
 * Calculate retry delay using configured backoff strategy
 */
export function calculateRetryDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  let delay: number;

  switch (config.backoffStrategy) {
    case 'fixed':
      delay = config.initialDelayMs;
      break;

    case 'linear':
      delay = config.initialDelayMs * (attempt + 1);
      break;

    case 'exponential':
    default:
      delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
      break;
  }

  delay = Math.min(delay, config.maxDelayMs);

  // ±20%
  if (config.jitter) {
    const jitterRange = delay * 0.2;
    delay = delay + Math.random() * 2 * jitterRange - jitterRange;
  }

  return Math.round(delay);
}

/**
 * Options for withRetry
 */
export interface WithRetryOptions {
  config?: Partial<RetryConfig>;
  /** Called before each retry with the 1-based retry number */
  onRetry?: (retry: number, delayMs: number, error: Error) => void;
  sleep?: SleepFn;
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: WithRetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const wait = options.sleep ?? sleep;
  let lastError: Error = new Error('withRetry made no attempt');

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(error, attempt, config)) {
        throw lastError;
      }

      const delay = calculateRetryDelay(attempt, config);
      options.onRetry?.(attempt + 1, delay, lastError);
      await wait(delay);
    }
  }

  throw lastError;
}
