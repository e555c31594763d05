/**
 * GitModule - Low-level Git Operations
 *
 * Backend capability for reading repository state and mutating history.
 *
 * @module git
 */

export { LocalGitModule } from './local';
export { MemoryGitModule } from './memory';

export type {
  IGitModule,
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
} from './types';

export {
  GitError,
  GitCommandError,
  NoCommitsError,
  DetachedHeadError,
} from './errors';
