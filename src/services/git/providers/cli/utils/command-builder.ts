/**
 * @fileoverview Git CLI command builder utility
 * @module services/git/providers/cli/utils/command-builder
 */

import { SyncError, SyncErrorCode } from '../../../../../types-global/errors.js';

/**
 * Git command configuration.
 */
export interface GitCommandConfig {
  /** Base git command (e.g., 'status', 'commit', 'push') */
  command: string;
  /** Command arguments */
  args?: string[];
}

/**
 * Build a git command with arguments.
 *
 * @example
 * ```typescript
 * buildGitCommand({ command: 'push', args: ['origin', 'main', '--force'] })
 * // Returns: ['push', 'origin', 'main', '--force']
 * ```
 */
export function buildGitCommand(config: GitCommandConfig): string[] {
  const parts: string[] = [config.command];

  if (config.args && config.args.length > 0) {
    parts.push(...config.args);
  }

  return parts;
}

/**
 * Render an argument vector as a shell-like line for display, quoting
 * arguments that contain whitespace or quotes.
 *
 * @example
 * formatGitCommand(['commit', '-m', 'Fix typo']) // git commit -m "Fix typo"
 */
export function formatGitCommand(args: string[]): string {
  const rendered = args.map((arg) =>
    arg === '' || /[\s"'\\]/.test(arg)
      ? `"${arg.replace(/(["\\])/g, '\\$1')}"`
      : arg,
  );
  return ['git', ...rendered].join(' ');
}

/**
 * Build environment variables for a git command.
 *
 * The process environment (including PATH) is preserved so the git
 * executable and the user's credential helpers keep working. `LANG` and
 * `LC_ALL` are forced to UTF-8 so output parsing sees English messages.
 *
 * @param interactive - When false, terminal prompts are disabled.
 */
export function buildGitEnv(interactive: boolean): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }

  env.LANG = 'en_US.UTF-8';
  env.LC_ALL = 'en_US.UTF-8';
  if (!interactive) {
    env.GIT_TERMINAL_PROMPT = '0';
  }

  return env;
}

/**
 * Validate git command arguments before spawning.
 *
 * Arguments are passed to git as an array, never through a shell, so shell
 * metacharacters and newlines (multi-line commit messages) are safe. NUL
 * bytes are not: the OS truncates the argument at the first one.
 *
 * @throws {SyncError} with `InvalidArgument` when an argument contains a NUL byte
 */
export function validateGitArgs(args: string[]): void {
  for (const arg of args) {
    if (arg.includes('\0')) {
      throw new SyncError(
        SyncErrorCode.InvalidArgument,
        `Null byte detected in git argument: ${JSON.stringify(arg)}`,
      );
    }
  }
}
