/**
 * @fileoverview Types shared by git providers and the sync runner
 * @module services/git/types
 */

import type { RequestContext } from '../../utils/internal/requestContext.js';

/**
 * How a git process' output is handled.
 *
 * - `inherit`: stdout/stderr go straight to the terminal, stdin is shared so
 *   git can prompt for credentials.
 * - `capture`: output is collected and returned; prompts are disabled.
 */
export type GitOutputMode = 'inherit' | 'capture';

/**
 * Context passed to every provider operation.
 */
export interface GitOperationContext {
  /** Directory git runs in. */
  workingDirectory: string;
  /** Request context for logging. */
  requestContext: RequestContext;
  /** Output handling; providers default to `inherit`. */
  outputMode?: GitOutputMode;
}

/**
 * Raw outcome of a git invocation. A non-zero `exitCode` is a result, not
 * an exception.
 */
export interface GitCommandResult {
  exitCode: number;
  /** Empty in `inherit` mode. */
  stdout: string;
  /** Empty in `inherit` mode. */
  stderr: string;
}

/**
 * Runs `git <args>` in `cwd`.
 */
export type GitExecutor = (
  args: string[],
  cwd: string,
  ctx: RequestContext,
) => Promise<GitCommandResult>;

/**
 * Fields every operation result carries.
 */
export interface GitStepResult {
  /** True when git exited with code 0. */
  success: boolean;
  exitCode: number;
  /** Argument vector passed to git. */
  command: string[];
  stdout: string;
  stderr: string;
}

// ============================================================================
// Status
// ============================================================================

export interface GitStatusOptions {
  /** Use `--short` output. */
  short?: boolean;
  /** Include branch information (`--branch`). */
  branch?: boolean;
}

export type GitStatusResult = GitStepResult;

// ============================================================================
// Staging
// ============================================================================

export interface GitAddOptions {
  /**
   * Paths to stage. When omitted or empty, every change in the working tree
   * is staged (`-A`).
   */
  paths?: string[];
}

export type GitAddResult = GitStepResult;

// ============================================================================
// Commit
// ============================================================================

export interface GitCommitOptions {
  /** Passed verbatim to `-m`. */
  message: string;
  allowEmpty?: boolean;
  noVerify?: boolean;
}

export interface GitCommitResult extends GitStepResult {
  message: string;
}

// ============================================================================
// Remotes
// ============================================================================

export interface GitPullOptions {
  remote?: string;
  branch?: string;
  /** Rebase local commits on top of the fetched branch instead of merging. */
  rebase?: boolean;
}

export interface GitPullResult extends GitStepResult {
  remote: string;
  branch: string;
  strategy: 'merge' | 'rebase';
}

export interface GitPushOptions {
  remote?: string;
  branch?: string;
  /** Overwrite the remote ref unconditionally. */
  force?: boolean;
}

export interface GitPushResult extends GitStepResult {
  remote: string;
  branch: string;
  forced: boolean;
}
