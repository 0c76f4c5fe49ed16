/**
 * Error handling utilities
 */

import { isReelscopeError } from '../errors.js';

/**
 * Check if an error must end the run
 * @param error - The error to check
 * @returns Whether the run has to stop
 */
export function isFatalError(error: unknown): boolean {
  return isReelscopeError(error) && error.fatal;
}

/**
 * Format an error for logging or display
 * @param error - The error to format
 * @returns A formatted error string
 */
export function formatError(error: unknown): string {
  if (isReelscopeError(error)) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return `[${error.name}] ${error.message}`;
  }

  return String(error);
}

/**
 * Format an error with full details for debugging
 * @param error - The error to format
 * @returns A detailed error object
 */
export function formatErrorDetails(error: unknown): {
  message: string;
  code?: string;
  stack?: string;
  details?: Record<string, unknown>;
  cause?: string;
} {
  if (isReelscopeError(error)) {
    return {
      message: error.message,
      code: error.code,
      stack: error.stack,
      details: error.details,
      cause: error.cause?.message,
    };
  }

  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }

  return { message: String(error) };
}

/**
 * Get a message suitable for the operator's terminal
 * @param error - The error to describe
 * @returns The error's user message, or its plain message
 */
export function getUserFriendlyMessage(error: unknown): string {
  if (isReelscopeError(error)) {
    return error.userMessage ?? error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'An unexpected error occurred';
}
