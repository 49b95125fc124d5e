/**
 * @fileoverview Spawns git processes with Node's child_process.
 * @module services/git/providers/cli/utils/runtime-adapter
 */

import { spawn } from 'node:child_process';

import type { GitCommandResult, GitOutputMode } from '../../../types.js';

export interface SpawnGitOptions {
  cwd: string;
  env: Record<string, string>;
  outputMode: GitOutputMode;
  /** Kill the process after this many milliseconds. No limit when unset. */
  timeoutMs?: number | undefined;
}

/**
 * Spawns `git <args>` and resolves once it exits.
 *
 * The promise resolves for any exit code; it rejects only when the process
 * cannot be started, is killed by a signal, or exceeds `timeoutMs`.
 *
 * @example
 * ```typescript
 * const result = await spawnGitCommand(['push', 'origin', 'main'], {
 *   cwd: '/path/to/repo',
 *   env: buildGitEnv(true),
 *   outputMode: 'inherit',
 * });
 * if (result.exitCode !== 0) {
 *   // push was rejected
 * }
 * ```
 */
export function spawnGitCommand(
  args: string[],
  options: SpawnGitOptions,
): Promise<GitCommandResult> {
  return new Promise((resolve, reject) => {
    const capture = options.outputMode === 'capture';

    const proc = spawn('git', args, {
      cwd: options.cwd,
      env: options.env,
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : 'inherit',
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    let timedOut = false;
    const timeoutHandle =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGTERM');
          }, options.timeoutMs)
        : undefined;

    proc.on('error', (error) => {
      clearTimeout(timeoutHandle);
      reject(error);
    });

    proc.on('close', (exitCode, signal) => {
      clearTimeout(timeoutHandle);

      if (timedOut) {
        reject(
          new Error(
            `Git command timed out after ${(options.timeoutMs ?? 0) / 1000}s: git ${args.join(' ')}`,
          ),
        );
        return;
      }

      if (exitCode === null) {
        reject(
          new Error(
            `Git command terminated by signal ${signal ?? 'unknown'}: git ${args.join(' ')}`,
          ),
        );
        return;
      }

      resolve({
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      });
    });
  });
}
