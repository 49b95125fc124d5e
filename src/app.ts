/**
 * @fileoverview Application bootstrap. Loads configuration, initializes the
 * logger, parses the command line and runs the sync sequence.
 * @module src/app
 */
import type { AppConfig as AppConfigType } from './config/index.js';
import { createProgram } from './cli/program.js';
import container, {
  AppConfig,
  SyncRunnerToken,
  composeContainer,
} from './container/index.js';
import type { SyncRunner } from './services/sync/SyncRunner.js';
import { SyncError } from './types-global/errors.js';
import { logger } from './utils/internal/logger.js';
import { requestContextService } from './utils/internal/requestContext.js';

/**
 * Run the CLI against `argv` and resolve with the process exit code: the
 * last git command's exit code, or 1 when the run could not complete.
 */
export const start = async (argv: string[]): Promise<number> => {
  let config: AppConfigType;
  try {
    composeContainer();
    config = container.resolve<AppConfigType>(AppConfig);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    if (error instanceof SyncError && error.data) {
      console.error(JSON.stringify(error.data.validationErrors ?? error.data));
    }
    return 1;
  }

  logger.initialize({
    logLevel: config.logLevel,
    logsPath: config.logsPath,
    environment: config.environment,
    version: config.pkg.version,
  });

  let exitCode = 0;
  const program = createProgram(
    {
      name: config.pkg.name,
      version: config.pkg.version,
      description: config.pkg.description,
    },
    async (options) => {
      const runner = container.resolve<SyncRunner>(SyncRunnerToken);
      const report = await runner.run(options);
      exitCode = report.exitCode;
    },
  );

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const context = requestContextService.createRequestContext({
      operation: 'CliRun',
    });
    if (error instanceof SyncError) {
      logger.error(error.message, error, { ...context, code: error.code });
      console.error(error.message);
    } else {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.fatal('Unexpected failure', err, context);
      console.error(err.message);
    }
    exitCode = 1;
  }

  await logger.close();
  return exitCode;
};
