/**
 * @fileoverview Unit tests for the git add operation
 * @module tests/services/git/providers/cli/operations/add.test
 */
import { describe, expect, it } from 'vitest';

import { executeAdd } from '../../../../../../src/services/git/providers/cli/operations/index.js';
import {
  createMockExecutor,
  createTestContext,
} from '../../../../../helpers/testContext.js';

describe('executeAdd', () => {
  it('stages everything with -A when no paths are given', async () => {
    const execGit = createMockExecutor();

    const result = await executeAdd({}, createTestContext(), execGit);

    expect(execGit.mock.calls[0]?.[0]).toEqual(['add', '-A']);
    expect(result.success).toBe(true);
  });

  it('treats an empty path list like no paths', async () => {
    const execGit = createMockExecutor();

    const result = await executeAdd({ paths: [] }, createTestContext(), execGit);

    expect(result.command).toEqual(['add', '-A']);
  });

  it('stages named paths after a -- separator', async () => {
    const execGit = createMockExecutor();

    const result = await executeAdd(
      { paths: ['src/index.ts', '-odd-name'] },
      createTestContext(),
      execGit,
    );

    expect(result.command).toEqual(['add', '--', 'src/index.ts', '-odd-name']);
  });
});
