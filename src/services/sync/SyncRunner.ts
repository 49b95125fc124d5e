/**
 * @fileoverview Runs the fixed status → add → commit → pull → push sequence,
 * falling back to a force-push when the push fails.
 * @module services/sync/SyncRunner
 */

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '../../config/index.js';
import {
  AppConfig,
  GitProvider,
  StatusWriter as StatusWriterToken,
} from '../../container/tokens.js';
import { logger } from '../../utils/internal/logger.js';
import {
  requestContextService,
  type RequestContext,
} from '../../utils/internal/requestContext.js';
import type { IGitProvider } from '../git/core/IGitProvider.js';
import {
  buildGitCommand,
  formatGitCommand,
} from '../git/providers/cli/utils/command-builder.js';
import type { GitOperationContext, GitStepResult } from '../git/types.js';
import { SyncError, SyncErrorCode } from '../../types-global/errors.js';
import type {
  PlannedStep,
  ResolvedSyncOptions,
  StatusWriter,
  StepOutcome,
  SyncOptions,
  SyncReport,
  SyncStepName,
} from './types.js';

export const FORCE_PUSH_NOTICE = 'Push failed, attempting force push...';

/** Errors that end one git process without ruling out the next one. */
const INTERRUPTIONS: ReadonlySet<SyncErrorCode> = new Set([
  SyncErrorCode.Timeout,
  SyncErrorCode.SpawnFailed,
]);

@injectable()
export class SyncRunner {
  constructor(
    @inject(GitProvider) private readonly git: IGitProvider,
    @inject(AppConfig) private readonly config: AppConfigType,
    @inject(StatusWriterToken) private readonly writeStatus: StatusWriter,
  ) {}

  /**
   * Fill in omitted options from configuration.
   */
  resolveOptions(options: SyncOptions = {}): ResolvedSyncOptions {
    return {
      message: options.message ?? this.config.sync.defaultMessage,
      remote: options.remote ?? this.config.sync.remote,
      branch: options.branch ?? this.config.sync.branch,
      workingDirectory: options.workingDirectory ?? process.cwd(),
      forceOnFailure: options.forceOnFailure ?? this.config.sync.forceOnFailure,
      dryRun: options.dryRun ?? false,
      outputMode: options.outputMode ?? 'inherit',
    };
  }

  /**
   * The five primary steps for the given options, without the fallback.
   */
  plan(options: SyncOptions = {}): PlannedStep[] {
    const resolved = this.resolveOptions(options);
    return [
      { step: 'status', command: buildGitCommand({ command: 'status' }) },
      { step: 'add', command: buildGitCommand({ command: 'add', args: ['-A'] }) },
      {
        step: 'commit',
        command: buildGitCommand({
          command: 'commit',
          args: ['-m', resolved.message],
        }),
      },
      {
        step: 'pull',
        command: buildGitCommand({
          command: 'pull',
          args: [resolved.remote, resolved.branch, '--rebase'],
        }),
      },
      {
        step: 'push',
        command: buildGitCommand({
          command: 'push',
          args: [resolved.remote, resolved.branch],
        }),
      },
    ];
  }

  /**
   * Run the sequence. Failures of status, add, commit and pull are logged
   * and ignored, including a timeout or signal kill; only the push outcome
   * is inspected.
   *
   * @throws {SyncError} when git cannot be run at all
   */
  async run(options: SyncOptions = {}): Promise<SyncReport> {
    const resolved = this.resolveOptions(options);
    const requestContext = requestContextService.createRequestContext({
      operation: 'SyncRunner.run',
      additionalContext: {
        remote: resolved.remote,
        branch: resolved.branch,
        workingDirectory: resolved.workingDirectory,
        dryRun: resolved.dryRun,
      },
    });

    logger.info('Starting sync', requestContext);

    if (resolved.dryRun) {
      return this.dryRun(resolved, requestContext);
    }

    const context: GitOperationContext = {
      workingDirectory: resolved.workingDirectory,
      requestContext,
      outputMode: resolved.outputMode,
    };
    const steps: StepOutcome[] = [];
    const record = (step: SyncStepName, result: GitStepResult) => {
      steps.push({
        step,
        command: result.command,
        exitCode: result.exitCode,
        success: result.success,
      });
      return result;
    };

    const commands = new Map(
      this.plan(resolved).map((planned): [SyncStepName, string[]] => [
        planned.step,
        planned.command,
      ]),
    );
    const preliminary: Array<[SyncStepName, () => Promise<GitStepResult>]> = [
      ['status', () => this.git.status({}, context)],
      ['add', () => this.git.add({}, context)],
      ['commit', () => this.git.commit({ message: resolved.message }, context)],
      [
        'pull',
        () =>
          this.git.pull(
            { remote: resolved.remote, branch: resolved.branch, rebase: true },
            context,
          ),
      ],
    ];
    for (const [step, execute] of preliminary) {
      record(
        step,
        await this.tolerateInterruption(
          step,
          commands.get(step) ?? [],
          execute,
          requestContext,
        ),
      );
    }

    const push = record(
      'push',
      await this.git.push(
        { remote: resolved.remote, branch: resolved.branch },
        context,
      ),
    );

    let forced = false;
    let last: GitStepResult = push;

    if (!push.success && resolved.forceOnFailure) {
      this.writeStatus(FORCE_PUSH_NOTICE);
      logger.warning('Push rejected; force-pushing', {
        ...requestContext,
        exitCode: push.exitCode,
      });
      last = record(
        'force-push',
        await this.git.push(
          { remote: resolved.remote, branch: resolved.branch, force: true },
          context,
        ),
      );
      forced = true;
    }

    const report: SyncReport = {
      options: resolved,
      steps,
      forced,
      exitCode: last.exitCode,
    };

    logger.info('Sync finished', {
      ...requestContext,
      exitCode: report.exitCode,
      forced,
      failedSteps: steps.filter((s) => !s.success).map((s) => s.step),
    });

    return report;
  }

  /**
   * Turn a timeout or signal kill into a failed step result. Anything else
   * (git missing, a rejected argument) still ends the run.
   */
  private async tolerateInterruption(
    step: SyncStepName,
    command: string[],
    execute: () => Promise<GitStepResult>,
    requestContext: RequestContext,
  ): Promise<GitStepResult> {
    try {
      return await execute();
    } catch (error) {
      if (!(error instanceof SyncError) || !INTERRUPTIONS.has(error.code)) {
        throw error;
      }
      const reported = error.data?.exitCode;
      const exitCode = typeof reported === 'number' ? reported : 1;
      logger.warning(`Git ${step} was interrupted; continuing`, {
        ...requestContext,
        code: error.code,
        exitCode,
        reason: error.message,
      });
      return { success: false, exitCode, command, stdout: '', stderr: '' };
    }
  }

  private dryRun(
    resolved: ResolvedSyncOptions,
    requestContext: RequestContext,
  ): SyncReport {
    const steps = this.plan(resolved).map((planned) => {
      this.writeStatus(formatGitCommand(planned.command));
      return { ...planned, exitCode: 0, success: true };
    });

    logger.info('Dry run finished', requestContext);

    return { options: resolved, steps, forced: false, exitCode: 0 };
  }
}
