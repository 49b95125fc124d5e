/**
 * @fileoverview Maps failures to launch or supervise a git process onto
 * {@link SyncError}. Non-zero exits are not errors here; they are reported
 * as step results.
 * @module services/git/providers/cli/utils/error-mapper
 */

import { constants } from 'node:os';

import { SyncError, SyncErrorCode } from '../../../../../types-global/errors.js';

/**
 * Shell-style exit code for a process killed by `signal` (128 + signal
 * number), or 1 when the signal is unknown.
 *
 * @example
 * signalExitCode('SIGTERM') // 143
 */
export function signalExitCode(signal: string): number {
  const signo = Object.entries(constants.signals).find(
    ([name]) => name === signal,
  )?.[1];
  return signo === undefined ? 1 : 128 + signo;
}

/**
 * Raw error patterns and their corresponding error codes.
 */
const ERROR_PATTERNS: Array<{
  pattern: RegExp;
  code: SyncErrorCode;
  messageTransform?: (match: RegExpMatchArray, operation: string) => string;
  /** Exit code to report for the interrupted process. */
  exitCode?: (match: RegExpMatchArray) => number;
}> = [
  {
    pattern: /timed out after/i,
    code: SyncErrorCode.Timeout,
    // the runtime adapter kills timed-out processes with SIGTERM
    exitCode: () => signalExitCode('SIGTERM'),
  },
  {
    pattern: /terminated by signal (\w+)/i,
    code: SyncErrorCode.SpawnFailed,
    messageTransform: (match, operation) =>
      `Git ${operation} was terminated by signal ${match[1] ?? 'unknown'}`,
    exitCode: (match) => signalExitCode(match[1] ?? ''),
  },
  {
    pattern: /\b(eacces|eperm)\b/i,
    code: SyncErrorCode.SpawnFailed,
    messageTransform: (_match, operation) =>
      `Git ${operation} could not be started: permission denied`,
  },
];

/**
 * Check if an error indicates a missing git installation.
 */
export function isGitNotFoundError(error: unknown): boolean {
  if (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT' &&
    'path' in error &&
    error.path === 'git'
  ) {
    return true;
  }
  const message = (
    error instanceof Error ? error.message : String(error)
  ).toLowerCase();
  return (
    message.includes('git') &&
    (message.includes('spawn git enoent') ||
      message.includes('command not found'))
  );
}

/**
 * Map a git process error to a {@link SyncError}.
 *
 * @param error - The original error from spawning or supervising git
 * @param operation - The git operation that failed
 */
export function mapGitError(error: unknown, operation: string): SyncError {
  if (error instanceof SyncError) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  if (isGitNotFoundError(error)) {
    return new SyncError(
      SyncErrorCode.GitNotFound,
      'Git command not found. Please ensure Git is installed and in your PATH.',
      { operation },
      { cause },
    );
  }

  for (const { pattern, code, messageTransform, exitCode } of ERROR_PATTERNS) {
    const match = errorMessage.match(pattern);
    if (match) {
      const message = messageTransform
        ? messageTransform(match, operation)
        : `Git ${operation} failed: ${errorMessage}`;
      const data = exitCode
        ? { operation, exitCode: exitCode(match) }
        : { operation };

      return new SyncError(code, message, data, { cause });
    }
  }

  return new SyncError(
    SyncErrorCode.InternalError,
    `Git ${operation} failed: ${errorMessage}`,
    { operation },
    { cause },
  );
}

/**
 * Extract the first meaningful line from git stderr output, without the
 * `fatal:`/`error:`/`warning:` prefixes.
 *
 * @example
 * extractGitErrorMessage('error: failed to push some refs to origin\nhint: ...')
 * // 'failed to push some refs to origin'
 */
export function extractGitErrorMessage(stderr: string): string {
  const message = stderr
    .replace(/^fatal:\s*/gim, '')
    .replace(/^error:\s*/gim, '')
    .replace(/^warning:\s*/gim, '')
    .trim();

  const lines = message.split('\n').filter((l) => l.trim());
  return lines[0] ?? message;
}
