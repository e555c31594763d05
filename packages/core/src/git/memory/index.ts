/**
 * In-memory Git Module for tests
 *
 * @module git/memory
 */

export { MemoryGitModule } from './memory_git_module';
export type { MemoryGitFailure } from './memory_git_module';
