/**
 * @fileoverview Unit tests for git error mapping
 * @module tests/services/git/providers/cli/utils/error-mapper.test
 */
import { describe, expect, it } from 'vitest';

import {
  extractGitErrorMessage,
  isGitNotFoundError,
  mapGitError,
  signalExitCode,
} from '../../../../../../src/services/git/providers/cli/utils/error-mapper.js';
import {
  SyncError,
  SyncErrorCode,
} from '../../../../../../src/types-global/errors.js';

function spawnError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code, path: 'git' });
}

describe('isGitNotFoundError', () => {
  it('recognises a spawn ENOENT for git', () => {
    expect(isGitNotFoundError(spawnError('ENOENT', 'spawn git ENOENT'))).toBe(
      true,
    );
  });

  it('recognises a shell "command not found" message', () => {
    expect(isGitNotFoundError('sh: git: command not found')).toBe(true);
  });

  it('ignores unrelated errors', () => {
    expect(isGitNotFoundError(new Error('permission denied'))).toBe(false);
  });
});

describe('mapGitError', () => {
  it('returns SyncErrors unchanged', () => {
    const original = new SyncError(SyncErrorCode.InvalidArgument, 'bad');
    expect(mapGitError(original, 'push')).toBe(original);
  });

  it('maps a missing binary to GitNotFound', () => {
    const cause = spawnError('ENOENT', 'spawn git ENOENT');

    const mapped = mapGitError(cause, 'status');

    expect(mapped.code).toBe(SyncErrorCode.GitNotFound);
    expect(mapped.message).toBe(
      'Git command not found. Please ensure Git is installed and in your PATH.',
    );
    expect(mapped.cause).toBe(cause);
    expect(mapped.data).toEqual({ operation: 'status' });
  });

  it('maps a timeout', () => {
    const mapped = mapGitError(
      new Error('Git command timed out after 5s: git push origin main'),
      'push',
    );

    expect(mapped.code).toBe(SyncErrorCode.Timeout);
    expect(mapped.message).toBe(
      'Git push failed: Git command timed out after 5s: git push origin main',
    );
    expect(mapped.data).toEqual({ operation: 'push', exitCode: 143 });
  });

  it('maps a signal kill to SpawnFailed', () => {
    const mapped = mapGitError(
      new Error('Git command terminated by signal SIGKILL: git pull origin main'),
      'pull',
    );

    expect(mapped.code).toBe(SyncErrorCode.SpawnFailed);
    expect(mapped.message).toBe('Git pull was terminated by signal SIGKILL');
    expect(mapped.data).toEqual({ operation: 'pull', exitCode: 137 });
  });

  it('maps permission failures to SpawnFailed', () => {
    const mapped = mapGitError(spawnError('EACCES', 'spawn git EACCES'), 'add');

    expect(mapped.code).toBe(SyncErrorCode.SpawnFailed);
    expect(mapped.message).toBe(
      'Git add could not be started: permission denied',
    );
    expect(mapped.data).toEqual({ operation: 'add' });
  });

  it('falls back to InternalError', () => {
    const mapped = mapGitError('something odd', 'commit');

    expect(mapped.code).toBe(SyncErrorCode.InternalError);
    expect(mapped.message).toBe('Git commit failed: something odd');
    expect(mapped.cause).toBeUndefined();
  });
});

describe('signalExitCode', () => {
  it('adds the signal number to 128', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });

  it('falls back to 1 for an unknown signal', () => {
    expect(signalExitCode('SIGNOPE')).toBe(1);
  });
});

describe('extractGitErrorMessage', () => {
  it('returns the first line without the git prefix', () => {
    expect(
      extractGitErrorMessage(
        'error: failed to push some refs to origin\nhint: Updates were rejected\n',
      ),
    ).toBe('failed to push some refs to origin');
  });
});
