/**
 * Error codes and custom error classes for Reelscope
 */

/**
 * All error codes used in the Reelscope pipeline
 */
export type ErrorCode =
  // Input / configuration errors (hard abort)
  | 'INPUT_NOT_FOUND'
  | 'INVALID_INPUT'
  | 'CONFIGURATION_ERROR'

  // Browser automation errors (per attempt, retried)
  | 'AUTOMATION_FAILED'
  | 'TIMEOUT'

  // Session errors (operator action required)
  | 'SESSION_INVALID'
  | 'SESSION_MISSING'

  // Download errors
  | 'DOWNLOAD_FAILED'
  | 'UNSUPPORTED_PLATFORM'

  // Persistence errors (fatal)
  | 'PERSISTENCE_FAILED'
  | 'MIGRATION_FAILED';

/**
 * Codes whose failure ends the whole run rather than one item
 */
export const FATAL_ERROR_CODES: readonly ErrorCode[] = [
  'INPUT_NOT_FOUND',
  'INVALID_INPUT',
  'CONFIGURATION_ERROR',
  'SESSION_INVALID',
  'SESSION_MISSING',
  'PERSISTENCE_FAILED',
  'MIGRATION_FAILED',
];

/**
 * Custom error class for Reelscope errors
 */
export class ReelscopeError extends Error {
  /** Error code */
  readonly code: ErrorCode;

  /** Whether this error is retryable */
  readonly retryable: boolean;

  /** Message safe to show to the operator */
  readonly userMessage?: string;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      userMessage?: string;
      details?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'ReelscopeError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
    this.userMessage = options?.userMessage;
    this.details = options?.details;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReelscopeError);
    }
  }

  /**
   * Whether this error should stop the run
   */
  get fatal(): boolean {
    return FATAL_ERROR_CODES.includes(this.code);
  }

  toJSON(): {
    code: ErrorCode;
    message: string;
    retryable: boolean;
    userMessage?: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      userMessage: this.userMessage,
      details: this.details,
    };
  }
}

/**
 * Error factory functions for common error types
 */
export const Errors = {
  inputNotFound: (filePath: string) =>
    new ReelscopeError('INPUT_NOT_FOUND', `Input file not found: ${filePath}`, {
      details: { filePath },
      userMessage: `Required input file is missing: ${filePath}`,
    }),

  invalidInput: (message: string, details?: Record<string, unknown>) =>
    new ReelscopeError('INVALID_INPUT', message, { details }),

  configuration: (message: string, details?: Record<string, unknown>) =>
    new ReelscopeError('CONFIGURATION_ERROR', message, { details }),

  automation: (action: string, message: string, cause?: Error) =>
    new ReelscopeError('AUTOMATION_FAILED', `${action} failed: ${message}`, {
      retryable: true,
      details: { action },
      cause,
    }),

  timeout: (operation: string, timeoutMs: number) =>
    new ReelscopeError('TIMEOUT', `Operation timed out: ${operation}`, {
      retryable: true,
      details: { operation, timeoutMs },
    }),

  sessionInvalid: (reason: string) =>
    new ReelscopeError('SESSION_INVALID', `Chat session is not logged in: ${reason}`, {
      userMessage: 'The saved session is no longer valid. Run `reelscope login` and try again.',
      details: { reason },
    }),

  sessionMissing: (sessionPath: string) =>
    new ReelscopeError('SESSION_MISSING', `No saved session found at ${sessionPath}`, {
      userMessage: 'No saved session. Run `reelscope login` first.',
      details: { sessionPath },
    }),

  downloadFailed: (url: string, attempts: number, cause?: Error) =>
    new ReelscopeError('DOWNLOAD_FAILED', `Failed to download after ${attempts} attempts: ${url}`, {
      details: { url, attempts },
      cause,
    }),

  unsupportedPlatform: (url: string) =>
    new ReelscopeError('UNSUPPORTED_PLATFORM', `Unsupported platform for URL: ${url}`, {
      details: { url },
    }),

  persistence: (filePath: string, cause?: Error) =>
    new ReelscopeError('PERSISTENCE_FAILED', `Could not write result store: ${filePath}`, {
      details: { filePath },
      cause,
    }),

  migrationFailed: (filePath: string, cause?: Error) =>
    new ReelscopeError('MIGRATION_FAILED', `Could not migrate legacy result store: ${filePath}`, {
      details: { filePath },
      cause,
    }),
};

/**
 * Type guard to check if an error is a ReelscopeError
 */
export function isReelscopeError(error: unknown): error is ReelscopeError {
  return error instanceof ReelscopeError;
}
