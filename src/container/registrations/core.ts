/**
 * @fileoverview Registers core application services with the DI container.
 * @module src/container/registrations/core
 */
import { container, Lifecycle } from 'tsyringe';

import { parseConfig } from '../../config/index.js';
import { CliGitProvider } from '../../services/git/providers/cli/CliGitProvider.js';
import { SyncRunner } from '../../services/sync/SyncRunner.js';
import type { StatusWriter as StatusWriterFn } from '../../services/sync/types.js';
import {
  AppConfig,
  GitProvider,
  StatusWriter,
  SyncRunnerToken,
} from '../tokens.js';

/**
 * Registers configuration, the status writer, the git provider and the
 * sync runner.
 */
export const registerCoreServices = () => {
  // Configuration (parsed and registered as a static value)
  container.register(AppConfig, { useValue: parseConfig() });

  container.register<StatusWriterFn>(StatusWriter, {
    useValue: (line: string) => {
      process.stdout.write(`${line}\n`);
    },
  });

  container.register(
    GitProvider,
    { useClass: CliGitProvider },
    { lifecycle: Lifecycle.Singleton },
  );

  container.register(
    SyncRunnerToken,
    { useClass: SyncRunner },
    { lifecycle: Lifecycle.Singleton },
  );
};
