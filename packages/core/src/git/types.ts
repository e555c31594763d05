/**
 * Type Definitions for GitModule
 *
 * These types define the backend capability the override recorder consumes:
 * read the last commit, read working-tree status, replace the last commit
 * message, stage a path and create a commit.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * Runs a process and captures its output. Implementations resolve with a
 * non-zero exitCode instead of rejecting.
 */
export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 *
 * The repository root is explicit: every command runs with `cwd: repoRoot`,
 * never with the ambient process working directory.
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root */
  repoRoot: string;
  /** Function to execute shell commands */
  execCommand: ExecCommand;
};

/**
 * Backend operations used by the inspector and the override recorder.
 *
 * Implementations:
 * - LocalGitModule: runs the git CLI through execCommand
 * - MemoryGitModule: in-memory state for tests
 */
export interface IGitModule {
  /** Repository root every operation is scoped to */
  getRepoRoot(): Promise<string>;

  /** true when the root is inside a git work tree; never rejects */
  isRepository(): Promise<boolean>;

  /** true when HEAD resolves to a commit */
  hasCommits(): Promise<boolean>;

  /** Current branch name; rejects in detached HEAD state */
  getCurrentBranch(): Promise<string>;

  /** Full message of HEAD, trailing whitespace stripped */
  getLastCommitMessage(): Promise<string>;

  /** Full hash of HEAD */
  getLastCommitHash(): Promise<string>;

  /** Porcelain status lines; empty array when the tree is clean */
  getStatus(): Promise<string[]>;

  /** Replaces the message of HEAD with the content of a file */
  amendLastCommitMessage(messageFilePath: string): Promise<void>;

  /** Stages paths relative to the repository root */
  add(filePaths: string[]): Promise<void>;

  /**
   * Commits the given paths only; anything else in the index stays staged.
   * The paths must be tracked or staged. Read the new hash with
   * getLastCommitHash().
   */
  commit(message: string, filePaths: string[]): Promise<void>;
}
