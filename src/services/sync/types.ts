/**
 * @fileoverview Types for the sync sequence
 * @module services/sync/types
 */

import type { GitOutputMode } from '../git/types.js';

/** Steps of a sync run, in execution order. */
export type SyncStepName =
  | 'status'
  | 'add'
  | 'commit'
  | 'pull'
  | 'push'
  | 'force-push';

/**
 * Options for a single run. Omitted fields fall back to configuration.
 */
export interface SyncOptions {
  /** Commit message; the configured placeholder when omitted. */
  message?: string | undefined;
  remote?: string | undefined;
  branch?: string | undefined;
  /** Defaults to the process working directory. */
  workingDirectory?: string | undefined;
  /** Force-push when the push fails. */
  forceOnFailure?: boolean | undefined;
  /** Print the commands instead of running them. */
  dryRun?: boolean | undefined;
  outputMode?: GitOutputMode | undefined;
}

/** Fully-resolved options for a run. */
export interface ResolvedSyncOptions {
  message: string;
  remote: string;
  branch: string;
  workingDirectory: string;
  forceOnFailure: boolean;
  dryRun: boolean;
  outputMode: GitOutputMode;
}

/** One planned git invocation. */
export interface PlannedStep {
  step: SyncStepName;
  /** Arguments passed to git. */
  command: string[];
}

/** Outcome of one executed (or dry-run) step. */
export interface StepOutcome extends PlannedStep {
  exitCode: number;
  success: boolean;
}

export interface SyncReport {
  options: ResolvedSyncOptions;
  /** Every step that ran, in order. */
  steps: StepOutcome[];
  /** True when the force-push fallback ran. */
  forced: boolean;
  /** Exit code of the last git command executed. */
  exitCode: number;
}

/** Receives user-facing status lines. */
export type StatusWriter = (line: string) => void;
