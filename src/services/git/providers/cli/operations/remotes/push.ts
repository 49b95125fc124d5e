/**
 * @fileoverview CLI provider git push operation
 * @module services/git/providers/cli/operations/remotes/push
 */

import type {
  GitExecutor,
  GitOperationContext,
  GitPushOptions,
  GitPushResult,
} from '../../../../types.js';
import { buildGitCommand } from '../../utils/index.js';

/**
 * Execute git push to upload local commits. A rejected push is a non-zero
 * exit and comes back with `success: false`.
 */
export async function executePush(
  options: GitPushOptions,
  context: GitOperationContext,
  execGit: GitExecutor,
): Promise<GitPushResult> {
  const args: string[] = [];
  const remote = options.remote || 'origin';

  args.push(remote);

  if (options.branch) {
    args.push(options.branch);
  }

  if (options.force) {
    args.push('--force');
  }

  const cmd = buildGitCommand({ command: 'push', args });
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
    remote,
    branch: options.branch || 'HEAD',
    forced: options.force ?? false,
  };
}
