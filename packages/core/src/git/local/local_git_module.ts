/**
 * LocalGitModule - Low-level Git Operations
 *
 * Exposes the semantic operations the override recorder needs instead of raw
 * Git commands. Every command runs through the injected execCommand with the
 * configured repository root as working directory.
 *
 * @module git/local
 */

import type {
  GitModuleDependencies,
  IGitModule,
  ExecCommand,
  ExecResult,
} from '../types';
import {
  GitCommandError,
  NoCommitsError,
  DetachedHeadError,
} from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitModule] ');

/**
 * LocalGitModule class providing low-level Git operations
 *
 * All operations are async and use dependency injection for testability.
 * Errors are transformed into typed exceptions for better handling.
 */
export class LocalGitModule implements IGitModule {
  private readonly repoRoot: string;
  private readonly execCommand: ExecCommand;

  /**
   * Creates a new LocalGitModule instance
   *
   * @throws Error if repoRoot or execCommand is missing
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }
    if (!dependencies.repoRoot) {
      throw new Error('repoRoot is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Executes a Git command in the repository root.
   *
   * A rejected execCommand (binary missing, spawn failure) becomes a
   * GitCommandError so callers only deal with one error family.
   */
  private async execGit(args: string[]): Promise<ExecResult> {
    try {
      return await this.execCommand('git', args, { cwd: this.repoRoot });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new GitCommandError('Git could not be executed', reason, `git ${args.join(' ')}`);
    }
  }

  /**
   * Turns a failed HEAD read into NoCommitsError when HEAD does not resolve,
   * and into GitCommandError otherwise.
   */
  private async headFailure(message: string, result: ExecResult, command: string): Promise<Error> {
    if (!(await this.hasCommits()) && (await this.isRepository())) {
      return new NoCommitsError();
    }
    return new GitCommandError(message, result.stderr, command, result.stdout);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READ OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.repoRoot;
  }

  /**
   * Checks whether the repository root is inside a Git repository
   *
   * @returns false on any backend error
   */
  async isRepository(): Promise<boolean> {
    try {
      const result = await this.execGit(['rev-parse', '--git-dir']);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  /**
   * Checks whether HEAD resolves to a commit
   *
   * @returns false for a fresh repository or on backend error
   */
  async hasCommits(): Promise<boolean> {
    try {
      const result = await this.execGit(['rev-parse', '--verify', '--quiet', 'HEAD']);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  /**
   * Returns the name of the current branch (HEAD)
   *
   * @throws DetachedHeadError in detached HEAD state
   * @throws GitCommandError if the command fails
   *
   * @example
   * const branch = await gitModule.getCurrentBranch();
   * // => "main"
   */
  async getCurrentBranch(): Promise<string> {
    const result = await this.execGit(['rev-parse', '--abbrev-ref', 'HEAD']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to get current branch', result.stderr, 'git rev-parse --abbrev-ref HEAD');
    }

    const branch = result.stdout.trim();

    if (branch === 'HEAD') {
      throw new DetachedHeadError();
    }

    return branch;
  }

  /**
   * Returns the full message of the last commit with trailing whitespace stripped
   *
   * @throws NoCommitsError if HEAD does not resolve
   * @throws GitCommandError if the command fails
   *
   * @example
   * const message = await gitModule.getLastCommitMessage();
   * // => "feat: add login\n\nDetailed description..."
   */
  async getLastCommitMessage(): Promise<string> {
    const command = 'git log -1 --pretty=format:%B';
    const result = await this.execGit(['log', '-1', '--pretty=format:%B']);

    if (result.exitCode !== 0) {
      throw await this.headFailure('Failed to get last commit message', result, command);
    }

    return result.stdout.trimEnd();
  }

  /**
   * Returns the full hash of the last commit
   *
   * @throws NoCommitsError if HEAD does not resolve
   * @throws GitCommandError if the command fails
   */
  async getLastCommitHash(): Promise<string> {
    const result = await this.execGit(['rev-parse', 'HEAD']);

    if (result.exitCode !== 0) {
      throw await this.headFailure('Failed to get last commit hash', result, 'git rev-parse HEAD');
    }

    const hash = result.stdout.trim();
    logger.debug(`Got HEAD hash: ${hash.substring(0, 8)}...`);
    return hash;
  }

  /**
   * Returns porcelain status lines, one per changed path
   *
   * @throws GitCommandError if the command fails
   */
  async getStatus(): Promise<string[]> {
    const result = await this.execGit(['status', '--porcelain']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to read working tree status', result.stderr, 'git status --porcelain');
    }

    return result.stdout.split('\n').filter((line) => line.trim().length > 0);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // WRITE OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Replaces the message of HEAD with the content of a file
   *
   * The message is taken verbatim so an appended block survives unchanged.
   *
   * @throws GitCommandError if the amend fails
   */
  async amendLastCommitMessage(messageFilePath: string): Promise<void> {
    const args = ['commit', '--amend', '--cleanup=verbatim', '-F', messageFilePath];
    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to amend commit message', result.stderr, `git ${args.join(' ')}`);
    }
  }

  /**
   * Adds files to the staging area
   *
   * @throws GitCommandError if operation fails
   *
   * @example
   * await gitModule.add([".validation_override"]);
   */
  async add(filePaths: string[]): Promise<void> {
    const result = await this.execGit(['add', '--', ...filePaths]);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to add files', result.stderr, `git add -- ${filePaths.join(' ')}`);
    }
  }

  /**
   * Creates a commit containing only the given paths
   *
   * Uses `--only`, so changes the user staged for other paths are neither
   * committed nor unstaged.
   *
   * @throws GitCommandError if operation fails
   *
   * @example
   * await gitModule.add([".validation_override"]);
   * await gitModule.commit("API Validation Override Record\n...", [".validation_override"]);
   */
  async commit(message: string, filePaths: string[]): Promise<void> {
    const args = ['commit', '--cleanup=verbatim', '--only', '-m', message, '--', ...filePaths];
    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to create commit', result.stderr, `git commit --only -- ${filePaths.join(' ')}`);
    }
  }
}
