/**
 * @fileoverview CLI provider git status operation
 * @module services/git/providers/cli/operations/core/status
 */

import type {
  GitExecutor,
  GitOperationContext,
  GitStatusOptions,
  GitStatusResult,
} from '../../../../types.js';
import { buildGitCommand } from '../../utils/index.js';

/**
 * Execute git status to report the working tree state. The result is
 * informational; its outcome never changes what the caller does next.
 */
export async function executeStatus(
  options: GitStatusOptions,
  context: GitOperationContext,
  execGit: GitExecutor,
): Promise<GitStatusResult> {
  const args: string[] = [];

  if (options.short) {
    args.push('--short');
  }

  if (options.branch) {
    args.push('--branch');
  }

  const cmd = buildGitCommand({ command: 'status', args });
  const result = await execGit(
    cmd,
    context.workingDirectory,
    context.requestContext,
  );

  return {
    success: result.exitCode === 0,
    exitCode: result.exitCode,
    command: cmd,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
