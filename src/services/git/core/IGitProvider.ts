/**
 * @fileoverview Git provider interface - contract for git implementations
 * @module services/git/core/IGitProvider
 *
 * Operations report a non-zero git exit as `success: false` rather than
 * throwing; they throw a SyncError only when git could not run at all.
 */

import type {
  GitAddOptions,
  GitAddResult,
  GitCommitOptions,
  GitCommitResult,
  GitOperationContext,
  GitPullOptions,
  GitPullResult,
  GitPushOptions,
  GitPushResult,
  GitStatusOptions,
  GitStatusResult,
} from '../types.js';

export interface IGitProvider {
  /** Provider name, used in log records. */
  readonly name: string;

  /**
   * Check that the provider can run git in the given context.
   */
  healthCheck(context: GitOperationContext): Promise<boolean>;

  /** Report working tree status. */
  status(
    options: GitStatusOptions,
    context: GitOperationContext,
  ): Promise<GitStatusResult>;

  /** Stage changes. */
  add(options: GitAddOptions, context: GitOperationContext): Promise<GitAddResult>;

  /** Commit staged changes. */
  commit(
    options: GitCommitOptions,
    context: GitOperationContext,
  ): Promise<GitCommitResult>;

  /** Fetch and integrate a remote branch. */
  pull(
    options: GitPullOptions,
    context: GitOperationContext,
  ): Promise<GitPullResult>;

  /** Upload local commits to a remote branch. */
  push(
    options: GitPushOptions,
    context: GitOperationContext,
  ): Promise<GitPushResult>;
}
