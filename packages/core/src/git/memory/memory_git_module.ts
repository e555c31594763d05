/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Keeps a commit list, a working-tree status and a staging area in memory.
 * No process is spawned; the only I/O is reading the message file handed to
 * amendLastCommitMessage, through an injectable reader.
 *
 * Test Helpers:
 * - setCommits(commits[]): Set commit history (last = HEAD)
 * - setStatus(lines[]): Set porcelain status lines
 * - setStaged(paths[]): Seed the index with paths the user already staged
 * - setBranch(name | null): Set current branch (null = detached HEAD)
 * - setRepository(flag): Pretend the root is not a repository
 * - failOn(operation): Make an operation reject with GitCommandError
 * - clear(): Reset all state
 *
 * @module git/memory
 */

import { readFile } from 'fs/promises';
import type { IGitModule } from '../types';
import {
  GitCommandError,
  NoCommitsError,
  DetachedHeadError,
} from '../errors';

export type MemoryGitFailure = Exclude<keyof IGitModule, 'getRepoRoot'>;

export type MemoryCommit = {
  hash: string;
  message: string;
  files?: string[];
};

type MessageReader = (filePath: string) => Promise<string>;

interface MemoryGitState {
  isRepository: boolean;
  currentBranch: string | null;
  commits: MemoryCommit[];
  status: string[];
  stagedFiles: string[];
  failures: Set<MemoryGitFailure>;
  nextHash: number;
}

function initialState(): MemoryGitState {
  return {
    isRepository: true,
    currentBranch: 'main',
    commits: [],
    status: [],
    stagedFiles: [],
    failures: new Set(),
    nextHash: 1,
  };
}

/**
 * MemoryGitModule - In-memory Git mock for unit tests
 */
export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;
  private readonly repoRoot: string;
  private readonly readMessage: MessageReader;

  constructor(repoRoot: string = '/test/repo', readMessage?: MessageReader) {
    this.repoRoot = repoRoot;
    this.readMessage = readMessage ?? ((filePath) => readFile(filePath, 'utf-8'));
    this.state = initialState();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setCommits(commits: MemoryCommit[]): void {
    this.state.commits = commits.map((c) => ({ ...c }));
  }

  getCommits(): MemoryCommit[] {
    return this.state.commits.map((c) => ({ ...c }));
  }

  setStatus(lines: string[]): void {
    this.state.status = [...lines];
  }

  setBranch(name: string | null): void {
    this.state.currentBranch = name;
  }

  setRepository(isRepository: boolean): void {
    this.state.isRepository = isRepository;
  }

  setStaged(filePaths: string[]): void {
    this.state.stagedFiles = [...filePaths];
  }

  getStagedFiles(): string[] {
    return [...this.state.stagedFiles];
  }

  failOn(operation: MemoryGitFailure): void {
    this.state.failures.add(operation);
  }

  clear(): void {
    this.state = initialState();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private assertAvailable(operation: MemoryGitFailure): void {
    if (this.state.failures.has(operation)) {
      throw new GitCommandError(`Simulated failure: ${operation}`, 'simulated backend failure', operation);
    }
    if (!this.state.isRepository) {
      throw new GitCommandError('Not in a Git repository', 'fatal: not a git repository', operation);
    }
  }

  private head(): MemoryCommit {
    const head = this.state.commits[this.state.commits.length - 1];
    if (!head) {
      throw new NoCommitsError();
    }
    return head;
  }

  private generateHash(): string {
    const hash = this.state.nextHash.toString(16).padStart(40, '0');
    this.state.nextHash += 1;
    return hash;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.repoRoot;
  }

  async isRepository(): Promise<boolean> {
    return this.state.isRepository && !this.state.failures.has('isRepository');
  }

  async hasCommits(): Promise<boolean> {
    if (!(await this.isRepository()) || this.state.failures.has('hasCommits')) {
      return false;
    }
    return this.state.commits.length > 0;
  }

  async getCurrentBranch(): Promise<string> {
    this.assertAvailable('getCurrentBranch');
    if (this.state.currentBranch === null) {
      throw new DetachedHeadError();
    }
    return this.state.currentBranch;
  }

  async getLastCommitMessage(): Promise<string> {
    this.assertAvailable('getLastCommitMessage');
    return this.head().message.trimEnd();
  }

  async getLastCommitHash(): Promise<string> {
    this.assertAvailable('getLastCommitHash');
    return this.head().hash;
  }

  async getStatus(): Promise<string[]> {
    this.assertAvailable('getStatus');
    return [...this.state.status];
  }

  async amendLastCommitMessage(messageFilePath: string): Promise<void> {
    this.assertAvailable('amendLastCommitMessage');
    const head = this.head();
    const message = await this.readMessage(messageFilePath);
    const amended = { ...head, message, hash: this.generateHash() };
    this.state.commits = [...this.state.commits.slice(0, -1), amended];
  }

  async add(filePaths: string[]): Promise<void> {
    this.assertAvailable('add');
    for (const filePath of filePaths) {
      if (!this.state.stagedFiles.includes(filePath)) {
        this.state.stagedFiles.push(filePath);
      }
    }
  }

  async commit(message: string, filePaths: string[]): Promise<void> {
    this.assertAvailable('commit');
    const unstaged = filePaths.filter((filePath) => !this.state.stagedFiles.includes(filePath));
    if (filePaths.length === 0 || unstaged.length > 0) {
      throw new GitCommandError(
        'Failed to create commit',
        `error: pathspec '${unstaged.join(' ')}' did not match any file(s) known to git`,
        'commit'
      );
    }
    this.state.commits.push({ hash: this.generateHash(), message, files: [...filePaths] });
    this.state.stagedFiles = this.state.stagedFiles.filter((filePath) => !filePaths.includes(filePath));
  }
}
