/**
 * @fileoverview CLI provider git commit operation
 * @module services/git/providers/cli/operations/commits/commit
 */

import type {
  GitCommitOptions,
  GitCommitResult,
  GitExecutor,
  GitOperationContext,
} from '../../../../types.js';
import { buildGitCommand } from '../../utils/index.js';

/**
 * Execute git commit with the given message. "Nothing to commit" is a
 * non-zero exit and comes back as an unsuccessful result.
 */
export async function executeCommit(
  options: GitCommitOptions,
  context: GitOperationContext,
  execGit: GitExecutor,
): Promise<GitCommitResult> {
  const args: string[] = ['-m', options.message];

  if (options.allowEmpty) {
    args.push('--allow-empty');
  }

  if (options.noVerify) {
    args.push('--no-verify');
  }

  const cmd = buildGitCommand({ command: 'commit', args });
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
    message: options.message,
  };
}
