/**
 * @fileoverview CLI-based Git provider implementation
 * @module services/git/providers/cli/CliGitProvider
 *
 * Wraps the native git binary. Requires git on PATH; authentication and
 * signing follow the user's own git configuration.
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '../../../../config/index.js';
import { AppConfig } from '../../../../container/tokens.js';
import { logger } from '../../../../utils/internal/logger.js';
import type { RequestContext } from '../../../../utils/internal/requestContext.js';
import { BaseGitProvider } from '../../core/BaseGitProvider.js';
import type { IGitProvider } from '../../core/IGitProvider.js';
import type {
  GitAddOptions,
  GitAddResult,
  GitCommandResult,
  GitCommitOptions,
  GitCommitResult,
  GitExecutor,
  GitOperationContext,
  GitPullOptions,
  GitPullResult,
  GitPushOptions,
  GitPushResult,
  GitStatusOptions,
  GitStatusResult,
} from '../../types.js';
import {
  executeAdd,
  executeCommit,
  executePull,
  executePush,
  executeStatus,
} from './operations/index.js';
import { isGitNotFoundError } from './utils/error-mapper.js';
import { executeGitCommand } from './utils/git-executor.js';

/**
 * CLI-based git provider using the native git binary.
 *
 * @implements {IGitProvider}
 * @extends {BaseGitProvider}
 */
@injectable()
export class CliGitProvider extends BaseGitProvider implements IGitProvider {
  readonly name = 'cli';

  constructor(@inject(AppConfig) private readonly config: AppConfigType) {
    super();
  }

  /**
   * Check if git binary is available and functional.
   */
  async healthCheck(context: GitOperationContext): Promise<boolean> {
    try {
      const { exitCode, stdout } = await executeGitCommand(
        ['--version'],
        context.workingDirectory,
        {
          outputMode: 'capture',
          timeoutMs: this.config.git.commandTimeoutMs,
          requestContext: context.requestContext,
        },
      );
      return exitCode === 0 && stdout.includes('git version');
    } catch (error) {
      if (isGitNotFoundError(error)) {
        logger.warning('Git binary not found', {
          ...context.requestContext,
          provider: this.name,
          workingDirectory: context.workingDirectory,
        });
      }
      return false;
    }
  }

  async status(
    options: GitStatusOptions,
    context: GitOperationContext,
  ): Promise<GitStatusResult> {
    this.validateWorkingDirectory(context);
    this.logOperationStart('status', context, options);
    const result = await executeStatus(
      options,
      context,
      this.createExecutor(context),
    );
    this.logOperationResult('status', context, result);
    return result;
  }

  async add(
    options: GitAddOptions,
    context: GitOperationContext,
  ): Promise<GitAddResult> {
    this.validateWorkingDirectory(context);
    this.logOperationStart('add', context, options);
    const result = await executeAdd(
      options,
      context,
      this.createExecutor(context),
    );
    this.logOperationResult('add', context, result);
    return result;
  }

  async commit(
    options: GitCommitOptions,
    context: GitOperationContext,
  ): Promise<GitCommitResult> {
    this.validateWorkingDirectory(context);
    this.logOperationStart('commit', context, options);
    const result = await executeCommit(
      options,
      context,
      this.createExecutor(context),
    );
    this.logOperationResult('commit', context, result);
    return result;
  }

  async pull(
    options: GitPullOptions,
    context: GitOperationContext,
  ): Promise<GitPullResult> {
    this.validateWorkingDirectory(context);
    this.logOperationStart('pull', context, options);
    const result = await executePull(
      options,
      context,
      this.createExecutor(context),
    );
    this.logOperationResult('pull', context, result);
    return result;
  }

  async push(
    options: GitPushOptions,
    context: GitOperationContext,
  ): Promise<GitPushResult> {
    this.validateWorkingDirectory(context);
    this.logOperationStart('push', context, options);
    const result = await executePush(
      options,
      context,
      this.createExecutor(context),
    );
    this.logOperationResult('push', context, result);
    return result;
  }

  private createExecutor(context: GitOperationContext): GitExecutor {
    const outputMode = context.outputMode ?? 'inherit';
    const timeoutMs = this.config.git.commandTimeoutMs;
    return (
      args: string[],
      cwd: string,
      requestContext: RequestContext,
    ): Promise<GitCommandResult> =>
      executeGitCommand(args, cwd, { outputMode, timeoutMs, requestContext });
  }
}
