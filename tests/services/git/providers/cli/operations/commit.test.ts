/**
 * @fileoverview Unit tests for the git commit operation
 * @module tests/services/git/providers/cli/operations/commit.test
 */
import { describe, expect, it } from 'vitest';

import { executeCommit } from '../../../../../../src/services/git/providers/cli/operations/index.js';
import {
  createMockExecutor,
  createTestContext,
} from '../../../../../helpers/testContext.js';

describe('executeCommit', () => {
  it('passes the message verbatim to -m', async () => {
    const message = 'Fix "quoted" $HOME;\nsecond line';
    const execGit = createMockExecutor();

    const result = await executeCommit({ message }, createTestContext(), execGit);

    expect(execGit.mock.calls[0]?.[0]).toEqual(['commit', '-m', message]);
    expect(result.message).toBe(message);
    expect(result.success).toBe(true);
  });

  it('appends --allow-empty and --no-verify', async () => {
    const execGit = createMockExecutor();

    const result = await executeCommit(
      { message: 'empty', allowEmpty: true, noVerify: true },
      createTestContext(),
      execGit,
    );

    expect(result.command).toEqual([
      'commit',
      '-m',
      'empty',
      '--allow-empty',
      '--no-verify',
    ]);
  });

  it('returns an unsuccessful result when there is nothing to commit', async () => {
    const execGit = createMockExecutor({
      exitCode: 1,
      stdout: 'nothing to commit, working tree clean\n',
    });

    const result = await executeCommit(
      { message: 'Auto commit' },
      createTestContext(),
      execGit,
    );

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe('nothing to commit, working tree clean\n');
  });
});
