/**
 * @fileoverview Base git provider with shared functionality
 * @module services/git/core/BaseGitProvider
 */

import { statSync } from 'node:fs';

import { SyncError, SyncErrorCode } from '../../../types-global/errors.js';
import { logger } from '../../../utils/internal/logger.js';
import type { GitOperationContext, GitStepResult } from '../types.js';

/**
 * Abstract base class for git providers: working directory validation and
 * per-operation logging.
 *
 * @abstract
 */
export abstract class BaseGitProvider {
  abstract readonly name: string;

  abstract healthCheck(context: GitOperationContext): Promise<boolean>;

  /**
   * Log the start of a git operation.
   */
  protected logOperationStart(
    operation: string,
    context: GitOperationContext,
    options?: unknown,
  ): void {
    logger.debug(`Starting git ${operation}`, {
      ...context.requestContext,
      provider: this.name,
      workingDirectory: context.workingDirectory,
      options,
    });
  }

  /**
   * Log how a git operation ended. A non-zero exit is logged as a warning;
   * callers decide whether it matters.
   */
  protected logOperationResult(
    operation: string,
    context: GitOperationContext,
    result: GitStepResult,
  ): void {
    const logContext = {
      ...context.requestContext,
      provider: this.name,
      workingDirectory: context.workingDirectory,
      command: result.command,
      exitCode: result.exitCode,
    };
    if (result.success) {
      logger.info(`Git ${operation} completed successfully`, logContext);
    } else {
      logger.warning(
        `Git ${operation} exited with code ${result.exitCode}`,
        logContext,
      );
    }
  }

  /**
   * Validate that the working directory was given and is a directory. A
   * missing cwd would otherwise surface from spawn as the same ENOENT as a
   * missing git binary.
   *
   * @throws {SyncError} if the directory is empty or does not exist
   */
  protected validateWorkingDirectory(context: GitOperationContext): void {
    const { workingDirectory } = context;
    if (!workingDirectory || workingDirectory.trim() === '') {
      throw new SyncError(
        SyncErrorCode.InvalidArgument,
        'Working directory must be specified',
      );
    }

    if (!statSync(workingDirectory, { throwIfNoEntry: false })?.isDirectory()) {
      throw new SyncError(
        SyncErrorCode.InvalidArgument,
        `Working directory does not exist: ${workingDirectory}`,
        { workingDirectory },
      );
    }
  }
}
