import type { IGitModule } from '../git/types';

/**
 * Working tree status as the recorder sees it. `unknown` means the status
 * query itself failed.
 */
export type WorkingTreeStatus = 'clean' | 'dirty' | 'unknown';

/**
 * Repository state, re-queried on every call. Two calls may disagree when
 * something else mutates the repository in between.
 */
export type RepositoryState = {
  isRepository: boolean;
  hasUncommittedChanges: boolean;
  workingTree: WorkingTreeStatus;
  hasAtLeastOneCommit: boolean;
  currentBranch: string | null;
  lastCommitMessage: string | null;
  lastCommitHash: string | null;
};

export type RepositoryInspectorDependencies = {
  git: IGitModule;
};

/**
 * Read-only queries used to evaluate override preconditions.
 */
export interface IRepositoryInspector {
  getLastCommitMessage(): Promise<string>;
  getLastCommitHash(): Promise<string>;
  isRepository(): Promise<boolean>;
  getCurrentBranch(): Promise<string | null>;
  hasUncommittedChanges(): Promise<boolean>;
  getWorkingTreeStatus(): Promise<WorkingTreeStatus>;
  hasCommits(): Promise<boolean>;
  getState(): Promise<RepositoryState>;
}
