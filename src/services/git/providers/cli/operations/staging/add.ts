/**
 * @fileoverview CLI provider git add operation
 * @module services/git/providers/cli/operations/staging/add
 */

import type {
  GitAddOptions,
  GitAddResult,
  GitExecutor,
  GitOperationContext,
} from '../../../../types.js';
import { buildGitCommand } from '../../utils/index.js';

/**
 * Execute git add to stage changes. Without explicit paths every change
 * (modified, deleted and untracked) is staged.
 */
export async function executeAdd(
  options: GitAddOptions,
  context: GitOperationContext,
  execGit: GitExecutor,
): Promise<GitAddResult> {
  const args =
    options.paths && options.paths.length > 0
      ? ['--', ...options.paths]
      : ['-A'];

  const cmd = buildGitCommand({ command: 'add', args });
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
