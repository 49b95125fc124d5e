/**
 * @fileoverview Centralized Git CLI command executor
 * @module services/git/providers/cli/utils/git-executor
 *
 * Every git invocation goes through here: arguments are validated, the
 * environment is prepared for the chosen output mode, and launch failures
 * are mapped to {@link SyncError}.
 */

import { logger } from '../../../../../utils/internal/logger.js';
import {
  requestContextService,
  type RequestContext,
} from '../../../../../utils/internal/requestContext.js';
import type { GitCommandResult, GitOutputMode } from '../../../types.js';
import { buildGitEnv, validateGitArgs } from './command-builder.js';
import { extractGitErrorMessage, mapGitError } from './error-mapper.js';
import { spawnGitCommand } from './runtime-adapter.js';

export interface ExecuteGitOptions {
  outputMode?: GitOutputMode;
  /** No timeout when unset. */
  timeoutMs?: number | undefined;
  /** Spawn and exit are logged under this context. */
  requestContext?: RequestContext;
}

/**
 * Executes a git command and resolves with its exit code and (in `capture`
 * mode) its output.
 *
 * @param args - Git command arguments (e.g., ['push', 'origin', 'main'])
 * @param cwd - The working directory to execute the command in
 * @throws {SyncError} If git cannot be started, is killed, or times out
 *
 * @example
 * ```typescript
 * const { exitCode } = await executeGitCommand(['status'], '/path/to/repo');
 * ```
 */
export async function executeGitCommand(
  args: string[],
  cwd: string,
  options: ExecuteGitOptions = {},
): Promise<GitCommandResult> {
  const outputMode = options.outputMode ?? 'inherit';
  const requestContext =
    options.requestContext ??
    requestContextService.createRequestContext({
      operation: 'executeGitCommand',
    });
  const logContext = { ...requestContext, args, cwd };
  try {
    validateGitArgs(args);

    logger.debug(`Spawning git ${args[0] ?? ''}`, logContext);
    const result = await spawnGitCommand(args, {
      cwd,
      env: buildGitEnv(outputMode === 'inherit'),
      outputMode,
      timeoutMs: options.timeoutMs,
    });
    logger.debug(`git ${args[0] ?? ''} exited with code ${result.exitCode}`, {
      ...logContext,
      exitCode: result.exitCode,
      ...(result.exitCode !== 0 && result.stderr
        ? { reason: extractGitErrorMessage(result.stderr) }
        : {}),
    });
    return result;
  } catch (error) {
    throw mapGitError(error, args[0] ?? 'unknown');
  }
}
