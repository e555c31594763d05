/**
 * MemoryGitModule Tests
 *
 * The in-memory backend has to behave like LocalGitModule for the cases the
 * recorder relies on: HEAD resolution, status, amend, add and commit.
 */

import { MemoryGitModule } from './memory_git_module';
import { GitCommandError, NoCommitsError, DetachedHeadError } from '../errors';

describe('MemoryGitModule', () => {
  let git: MemoryGitModule;
  const messages = new Map<string, string>();

  beforeEach(() => {
    messages.clear();
    git = new MemoryGitModule('/test/repo', async (filePath) => messages.get(filePath) ?? '');
  });

  describe('Test Helpers', () => {
    it('should reset state with clear()', async () => {
      git.setCommits([{ hash: 'abc', message: 'first' }]);
      git.setStatus([' M a.ts']);
      git.setBranch(null);
      git.clear();

      expect(await git.hasCommits()).toBe(false);
      expect(await git.getStatus()).toEqual([]);
      expect(await git.getCurrentBranch()).toBe('main');
      expect(await git.getRepoRoot()).toBe('/test/repo');
    });
  });

  describe('Read Operations', () => {
    it('should report the last commit as HEAD', async () => {
      git.setCommits([
        { hash: 'first-hash', message: 'First' },
        { hash: 'last-hash', message: 'Last\n\n' },
      ]);

      expect(await git.getLastCommitHash()).toBe('last-hash');
      expect(await git.getLastCommitMessage()).toBe('Last');
    });

    it('should throw NoCommitsError without commits', async () => {
      await expect(git.getLastCommitMessage()).rejects.toBeInstanceOf(NoCommitsError);
      await expect(git.getLastCommitHash()).rejects.toBeInstanceOf(NoCommitsError);
    });

    it('should throw DetachedHeadError when no branch is checked out', async () => {
      git.setBranch(null);
      await expect(git.getCurrentBranch()).rejects.toBeInstanceOf(DetachedHeadError);
    });

    it('should reject every backend call outside a repository', async () => {
      git.setRepository(false);

      expect(await git.isRepository()).toBe(false);
      expect(await git.hasCommits()).toBe(false);
      await expect(git.getStatus()).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  describe('Write Operations', () => {
    it('should replace the HEAD message with the file content on amend', async () => {
      git.setCommits([{ hash: 'aaa', message: 'fix login bug' }]);
      messages.set('/tmp/msg', 'fix login bug\nappended');

      await git.amendLastCommitMessage('/tmp/msg');

      const commits = git.getCommits();
      expect(commits).toHaveLength(1);
      expect(commits[0]?.message).toBe('fix login bug\nappended');
      expect(commits[0]?.hash).not.toBe('aaa');
    });

    it('should commit only the given paths and clear them from the staging area', async () => {
      git.setCommits([{ hash: 'aaa', message: 'base' }]);
      await git.add(['.validation_override']);

      await git.commit('override', ['.validation_override']);

      const hash = await git.getLastCommitHash();
      expect(git.getCommits()[1]).toEqual({ hash, message: 'override', files: ['.validation_override'] });
      expect(git.getStagedFiles()).toEqual([]);
    });

    it('should keep other staged paths out of the commit', async () => {
      git.setCommits([{ hash: 'aaa', message: 'base' }]);
      git.setStaged(['src/feature.ts', 'README.md']);
      await git.add(['.validation_override']);

      await git.commit('override', ['.validation_override']);

      expect(git.getCommits()[1]?.files).toEqual(['.validation_override']);
      expect(git.getStagedFiles()).toEqual(['src/feature.ts', 'README.md']);
    });

    it('should refuse to commit a path that is not staged', async () => {
      git.setStaged(['src/feature.ts']);

      await expect(git.commit('empty', ['.validation_override'])).rejects.toMatchObject({
        message: 'Failed to create commit',
        stderr: "error: pathspec '.validation_override' did not match any file(s) known to git",
      });
      expect(git.getStagedFiles()).toEqual(['src/feature.ts']);
    });

    it('should refuse to commit without paths', async () => {
      await expect(git.commit('empty', [])).rejects.toThrow('Failed to create commit');
    });

    it('should fail a configured operation', async () => {
      git.failOn('add');
      await expect(git.add(['x'])).rejects.toMatchObject({ stderr: 'simulated backend failure' });
    });
  });
});
