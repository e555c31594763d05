/**
 * Custom Error Classes for GitModule
 *
 * These errors provide typed exceptions for better error handling
 * and diagnostics in the Git module operations.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command cannot run or exits non-zero
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string | undefined;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string, stdout?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when HEAD does not resolve (repository without commits)
 */
export class NoCommitsError extends GitError {
  constructor() {
    super('Repository has no commits (HEAD does not resolve)');
    this.name = 'NoCommitsError';
    Object.setPrototypeOf(this, NoCommitsError.prototype);
  }
}

/**
 * Error thrown when HEAD is detached and a branch name was requested
 */
export class DetachedHeadError extends GitError {
  constructor() {
    super('In detached HEAD state');
    this.name = 'DetachedHeadError';
    Object.setPrototypeOf(this, DetachedHeadError.prototype);
  }
}
