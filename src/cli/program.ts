/**
 * @fileoverview Command-line surface: `git-autopush [message] [options]`.
 * @module src/cli/program
 */
import { Command } from 'commander';

import type { SyncOptions } from '../services/sync/types.js';

export interface CliOptions {
  message?: string;
  remote?: string;
  branch?: string;
  cwd?: string;
  force?: boolean;
  dryRun?: boolean;
}

export interface ProgramInfo {
  name: string;
  version: string;
  description?: string | undefined;
}

/**
 * Merge the positional message and the parsed flags into sync options.
 * `--message` wins over the positional form.
 */
export function toSyncOptions(
  positionalMessage: string | undefined,
  opts: CliOptions,
): SyncOptions {
  return {
    message: opts.message ?? positionalMessage,
    remote: opts.remote,
    branch: opts.branch,
    workingDirectory: opts.cwd,
    forceOnFailure: opts.force,
    dryRun: opts.dryRun,
  };
}

/**
 * Build the commander program. `onSync` performs the run; the program only
 * parses arguments.
 */
export function createProgram(
  info: ProgramInfo,
  onSync: (options: SyncOptions) => Promise<void>,
): Command {
  const program = new Command();

  program
    .name(info.name)
    .description(
      info.description ??
        'Stage, commit, rebase-pull and push in one step, force-pushing if the push is rejected.',
    )
    .version(info.version)
    .argument('[message]', 'commit message')
    .option('-m, --message <text>', 'commit message (overrides the positional form)')
    .option('-r, --remote <name>', 'remote to pull from and push to')
    .option('-b, --branch <name>', 'branch to pull and push')
    .option('-C, --cwd <dir>', 'run in <dir> instead of the current directory')
    .option('--force', 'force-push when the push fails')
    .option('--no-force', 'never force-push')
    .option('--dry-run', 'print the git commands without running them')
    .action(async (message: string | undefined, opts: CliOptions) => {
      await onSync(toSyncOptions(message, opts));
    });

  return program;
}
