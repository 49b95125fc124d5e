/**
 * @fileoverview Tests for dependency injection container composition.
 * @module tests/container/index.test
 */
import { describe, expect, it, vi } from 'vitest';

import container, {
  AppConfig,
  GitProvider,
  StatusWriter,
  SyncRunnerToken,
  composeContainer,
} from '../../src/container/index.js';
import type { AppConfig as AppConfigType } from '../../src/config/index.js';
import { CliGitProvider } from '../../src/services/git/providers/cli/CliGitProvider.js';
import { SyncRunner } from '../../src/services/sync/SyncRunner.js';
import type { StatusWriter as StatusWriterFn } from '../../src/services/sync/types.js';

describe('composeContainer', () => {
  composeContainer();

  it('registers the parsed configuration', () => {
    const config = container.resolve<AppConfigType>(AppConfig);
    expect(config.pkg.name).toBe('git-autopush');
  });

  it('wires the sync runner to the CLI git provider as singletons', () => {
    const runner = container.resolve<SyncRunner>(SyncRunnerToken);

    expect(runner).toBeInstanceOf(SyncRunner);
    expect(container.resolve(GitProvider)).toBeInstanceOf(CliGitProvider);
    expect(container.resolve(SyncRunnerToken)).toBe(runner);
  });

  it('writes status lines to stdout', () => {
    const write = vi
      .spyOn(process.stdout, 'write')
      .mockImplementation(() => true);

    container.resolve<StatusWriterFn>(StatusWriter)('Push failed');

    expect(write).toHaveBeenCalledWith('Push failed\n');
    write.mockRestore();
  });

  it('is idempotent', () => {
    const before = container.resolve(SyncRunnerToken);
    composeContainer();
    expect(container.resolve(SyncRunnerToken)).toBe(before);
  });
});
