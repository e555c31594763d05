/**
 * Type Definitions for OverrideRecorder
 */

import type { IGitModule } from '../git/types';
import type { IRepositoryInspector } from '../repository_inspector';
import type { Logger } from '../logger/logger';

/**
 * Justification plus the failed checks of one override. Built per call and
 * only ever persisted as rendered text.
 */
export type OverrideRecord = Readonly<{
  justification: string;
  errors: readonly string[];
  warnings: readonly string[];
}>;

/** The three fallback tiers, in preference order */
export type OverrideTier = 'amend' | 'override-commit' | 'log-append';

export type TierOutcome = 'succeeded' | 'failed' | 'skipped';

/** What happened to one tier during a recordOverride call */
export type TierAttempt = {
  tier: OverrideTier;
  outcome: TierOutcome;
  /** Why the tier was skipped or failed */
  reason?: string;
};

export type OverrideSuccess = {
  success: true;
  /** Tier that durably recorded the override */
  tier: OverrideTier;
  attempts: TierAttempt[];
  /** Hash of the amended or newly created commit, when known */
  commitHash?: string;
  /** Sentinel or log file written by the succeeding tier */
  filePath?: string;
};

export type OverrideFailure = {
  success: false;
  attempts: TierAttempt[];
};

export type OverrideResult = OverrideSuccess | OverrideFailure;

/**
 * Input shared by every tier of one call
 */
export type StrategyContext = {
  record: OverrideRecord;
  appendix: string;
  repoRoot: string;
};

/** Details a tier reports when it succeeds */
export type StrategySuccess = {
  commitHash?: string;
  filePath?: string;
};

/**
 * One tier of the fallback chain.
 *
 * attempt() resolves when the override is durably recorded. It rejects with
 * PreconditionFailedError when the tier is not eligible, and with any other
 * error when it tried and failed.
 */
export interface OverrideStrategy {
  readonly tier: OverrideTier;
  attempt(context: StrategyContext): Promise<StrategySuccess>;
}

/**
 * File operations used by the recorder tiers.
 *
 * Implementations:
 * - FsOverrideFileSystem: node fs/promises
 * - MemoryOverrideFileSystem: in-memory for tests
 */
export interface OverrideFileSystem {
  /** Creates or overwrites a file */
  writeFile(filePath: string, content: string): Promise<void>;
  /** Appends to a file, creating it when missing */
  appendFile(filePath: string, content: string): Promise<void>;
  /** Writes content to a fresh scratch file and returns its path */
  createTempFile(content: string): Promise<string>;
  /** Deletes a scratch file created by createTempFile */
  removeTempFile(filePath: string): Promise<void>;
}

/**
 * Where and how the override is written
 */
export type OverrideRecorderOptions = {
  /** Sentinel file committed by the override-commit tier, relative to the repository root */
  sentinelFile: string;
  /** Append-only log file, relative to the repository root */
  logFile: string;
  /** First line of the dedicated override commit */
  commitBanner: string;
  /** Let the amend tier run when the working tree status cannot be read */
  treatUnknownTreeAsClean: boolean;
};

export type OverrideRecorderDependencies = {
  git: IGitModule;
  fileSystem: OverrideFileSystem;
  /** Defaults to a RepositoryInspector over `git` */
  inspector?: IRepositoryInspector;
  options?: Partial<OverrideRecorderOptions>;
  /** Clock for log timestamps */
  now?: () => Date;
  logger?: Logger;
  /** Replaces the default amend → override-commit → log-append chain */
  strategies?: OverrideStrategy[];
};
