/**
 * RepositoryInspector - read-only repository queries
 *
 * Wraps the read side of IGitModule with the failure policy the recorder
 * depends on: message and hash reads propagate NoCommitsError and
 * GitCommandError, boolean and optional queries degrade to a default.
 */

import type { IGitModule } from '../git/types';
import type {
  IRepositoryInspector,
  RepositoryInspectorDependencies,
  RepositoryState,
  WorkingTreeStatus,
} from './repository_inspector.types';
import { createLogger } from '../logger/logger';

const logger = createLogger('[RepositoryInspector] ');

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RepositoryInspector implements IRepositoryInspector {
  private readonly git: IGitModule;

  constructor(dependencies: RepositoryInspectorDependencies) {
    this.git = dependencies.git;
  }

  /**
   * @throws NoCommitsError when HEAD does not resolve
   * @throws GitCommandError when git fails
   */
  async getLastCommitMessage(): Promise<string> {
    return this.git.getLastCommitMessage();
  }

  /**
   * @throws NoCommitsError when HEAD does not resolve
   * @throws GitCommandError when git fails
   */
  async getLastCommitHash(): Promise<string> {
    return this.git.getLastCommitHash();
  }

  async isRepository(): Promise<boolean> {
    try {
      return await this.git.isRepository();
    } catch (error) {
      logger.debug(`Repository check failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * @returns null in detached HEAD state or on any backend error
   */
  async getCurrentBranch(): Promise<string | null> {
    try {
      return await this.git.getCurrentBranch();
    } catch (error) {
      logger.debug(`No current branch: ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Reports an unreadable status as clean. Callers that must not act on an
   * unknown tree use getWorkingTreeStatus() instead.
   */
  async hasUncommittedChanges(): Promise<boolean> {
    return (await this.getWorkingTreeStatus()) === 'dirty';
  }

  async getWorkingTreeStatus(): Promise<WorkingTreeStatus> {
    try {
      const lines = await this.git.getStatus();
      return lines.length > 0 ? 'dirty' : 'clean';
    } catch (error) {
      logger.warn(`Could not read working tree status: ${describeError(error)}`);
      return 'unknown';
    }
  }

  async hasCommits(): Promise<boolean> {
    try {
      return await this.git.hasCommits();
    } catch (error) {
      logger.debug(`HEAD check failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Queries every field afresh; nothing is cached between calls.
   */
  async getState(): Promise<RepositoryState> {
    const isRepository = await this.isRepository();
    const workingTree = await this.getWorkingTreeStatus();
    const hasAtLeastOneCommit = await this.hasCommits();
    const currentBranch = await this.getCurrentBranch();
    const lastCommitMessage = hasAtLeastOneCommit
      ? await this.getLastCommitMessage().catch(() => null)
      : null;
    const lastCommitHash = hasAtLeastOneCommit
      ? await this.getLastCommitHash().catch(() => null)
      : null;

    return {
      isRepository,
      hasUncommittedChanges: workingTree === 'dirty',
      workingTree,
      hasAtLeastOneCommit,
      currentBranch,
      lastCommitMessage,
      lastCommitHash,
    };
  }
}
