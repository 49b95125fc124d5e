/**
 * @fileoverview CLI provider git pull operation
 * @module services/git/providers/cli/operations/remotes/pull
 */

import type {
  GitExecutor,
  GitOperationContext,
  GitPullOptions,
  GitPullResult,
} from '../../../../types.js';
import { buildGitCommand } from '../../utils/index.js';

/**
 * Execute git pull to fetch and integrate remote changes.
 */
export async function executePull(
  options: GitPullOptions,
  context: GitOperationContext,
  execGit: GitExecutor,
): Promise<GitPullResult> {
  const args: string[] = [];
  const remote = options.remote || 'origin';

  args.push(remote);

  if (options.branch) {
    args.push(options.branch);
  }

  if (options.rebase) {
    args.push('--rebase');
  }

  const cmd = buildGitCommand({ command: 'pull', args });
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
    strategy: options.rebase ? 'rebase' : 'merge',
  };
}
