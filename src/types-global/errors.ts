/**
 * @fileoverview Defines the error codes and the custom error class used across
 * git-autopush. Every failure that stops the tool (as opposed to a git command
 * exiting non-zero, which is reported as a step outcome) is a {@link SyncError}.
 * @module src/types-global/errors
 */

/**
 * Categorises the failures the tool can raise.
 */
export enum SyncErrorCode {
  /** The git binary could not be located on PATH. */
  GitNotFound = 'GIT_NOT_FOUND',
  /** The git process could not be started. */
  SpawnFailed = 'SPAWN_FAILED',
  /** A git command exceeded the configured timeout. */
  Timeout = 'TIMEOUT',
  /** An argument was rejected before reaching git. */
  InvalidArgument = 'INVALID_ARGUMENT',
  /** Environment configuration failed validation. */
  ConfigurationError = 'CONFIGURATION_ERROR',
  /** A generic fallback. */
  InternalError = 'INTERNAL_ERROR',
}

/**
 * Custom error class carrying a {@link SyncErrorCode}, a human-readable
 * message and optional structured data for logging.
 */
export class SyncError extends Error {
  public code: SyncErrorCode;

  /**
   * Optional additional data about the error.
   */
  public readonly data?: Record<string, unknown>;

  constructor(
    code: SyncErrorCode,
    message?: string,
    data?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);

    this.code = code;
    if (data) {
      this.data = data;
    }
    this.name = 'SyncError';

    // Maintain a proper prototype chain.
    Object.setPrototypeOf(this, SyncError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError);
    }
  }
}
