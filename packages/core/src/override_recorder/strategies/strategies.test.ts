import { MemoryGitModule } from '../../git/memory';
import { RepositoryInspector } from '../../repository_inspector';
import { createLogger } from '../../logger/logger';
import { MemoryOverrideFileSystem } from '../memory';
import { buildAppendix, RULE } from '../appendix';
import { PreconditionFailedError } from '../errors';
import type { StrategyContext } from '../override_recorder.types';
import { AmendStrategy } from './amend_strategy';
import { OverrideCommitStrategy } from './override_commit_strategy';
import { LogAppendStrategy } from './log_append_strategy';

const REPO = '/work/repo';

describe('Override strategies', () => {
  let git: MemoryGitModule;
  let fileSystem: MemoryOverrideFileSystem;
  let context: StrategyContext;

  beforeEach(() => {
    fileSystem = new MemoryOverrideFileSystem();
    git = new MemoryGitModule(REPO, (filePath) => fileSystem.readFile(filePath));
    git.setCommits([{ hash: 'a'.repeat(40), message: 'Add payment endpoint' }]);

    const justification = 'urgent fix';
    const errors = ['missing field: user_id'];
    context = {
      record: { justification, errors, warnings: [] },
      appendix: buildAppendix(justification, errors, []),
      repoRoot: REPO,
    };
  });

  describe('AmendStrategy', () => {
    function createAmend(treatUnknownTreeAsClean = false): AmendStrategy {
      return new AmendStrategy({
        git,
        inspector: new RepositoryInspector({ git }),
        fileSystem,
        logger: createLogger('[test] ', 'silent'),
        treatUnknownTreeAsClean,
      });
    }

    it('should append the appendix to the last commit message', async () => {
      const result = await createAmend().attempt(context);

      const head = git.getCommits()[0];
      expect(head?.message).toBe('Add payment endpoint' + context.appendix);
      expect(result).toEqual({ commitHash: head?.hash });
    });

    it('should remove the scratch file after amending', async () => {
      await createAmend().attempt(context);

      expect(fileSystem.getTempFiles()).toEqual([]);
    });

    it('should remove the scratch file when the amend fails', async () => {
      git.failOn('amendLastCommitMessage');

      await expect(createAmend().attempt(context)).rejects.toThrow('Simulated failure: amendLastCommitMessage');
      expect(fileSystem.getTempFiles()).toEqual([]);
    });

    it('should still succeed when the scratch file cannot be removed', async () => {
      fileSystem.failOn('remove-temp');

      await expect(createAmend().attempt(context)).resolves.toHaveProperty('commitHash');
      expect(fileSystem.getTempFiles()).toEqual(['/tmp/pushgate-msg-1.txt']);
    });

    it('should succeed without a hash when the hash read fails after the amend', async () => {
      git.failOn('getLastCommitHash');

      await expect(createAmend().attempt(context)).resolves.toEqual({});
      expect(git.getCommits()[0]?.message).toBe('Add payment endpoint' + context.appendix);
    });

    it('should skip a dirty working tree', async () => {
      git.setStatus(['?? notes.txt']);

      await expect(createAmend().attempt(context)).rejects.toEqual(
        new PreconditionFailedError('working tree has uncommitted changes')
      );
      expect(git.getCommits()[0]?.message).toBe('Add payment endpoint');
    });

    it('should skip an empty repository', async () => {
      git.setCommits([]);

      await expect(createAmend().attempt(context)).rejects.toMatchObject({
        reason: 'repository has no commits',
      });
    });

    it('should skip when the status cannot be read', async () => {
      git.failOn('getStatus');

      await expect(createAmend().attempt(context)).rejects.toMatchObject({
        reason: 'working tree status could not be read',
      });
    });

    it('should amend an unreadable tree when told to treat it as clean', async () => {
      git.failOn('getStatus');

      await createAmend(true).attempt(context);

      expect(git.getCommits()[0]?.message).toBe('Add payment endpoint' + context.appendix);
    });
  });

  describe('OverrideCommitStrategy', () => {
    function createOverrideCommit(): OverrideCommitStrategy {
      return new OverrideCommitStrategy({
        git,
        fileSystem,
        sentinelFile: '.validation_override',
        commitBanner: 'API Validation Override Record',
        logger: createLogger('[test] ', 'silent'),
      });
    }

    it('should write, stage and commit the sentinel file', async () => {
      const result = await createOverrideCommit().attempt(context);

      expect(fileSystem.getFile(`${REPO}/.validation_override`)).toBe(context.appendix.slice(1) + '\n');
      const commits = git.getCommits();
      expect(commits).toHaveLength(2);
      expect(commits[1]?.message).toBe('API Validation Override Record\n' + context.appendix);
      expect(commits[1]?.files).toEqual(['.validation_override']);
      expect(result).toEqual({ commitHash: commits[1]?.hash, filePath: `${REPO}/.validation_override` });
    });

    it('should leave paths the user staged out of the commit', async () => {
      git.setStaged(['src/feature.ts']);

      await createOverrideCommit().attempt(context);

      expect(git.getCommits()[1]?.files).toEqual(['.validation_override']);
      expect(git.getStagedFiles()).toEqual(['src/feature.ts']);
    });

    it('should succeed without a hash when the hash read fails after the commit', async () => {
      git.failOn('getLastCommitHash');

      await expect(createOverrideCommit().attempt(context)).resolves.toEqual({
        filePath: `${REPO}/.validation_override`,
      });
      expect(git.getCommits()).toHaveLength(2);
    });

    it('should leave the sentinel behind when the commit fails', async () => {
      git.failOn('commit');

      await expect(createOverrideCommit().attempt(context)).rejects.toThrow('Simulated failure: commit');
      expect(fileSystem.getFile(`${REPO}/.validation_override`)).toBeDefined();
    });

    it('should fail before staging when the sentinel cannot be written', async () => {
      fileSystem.failOn('write');

      await expect(createOverrideCommit().attempt(context)).rejects.toMatchObject({ operation: 'write' });
      expect(git.getStagedFiles()).toEqual([]);
    });
  });

  describe('LogAppendStrategy', () => {
    const timestamp = new Date('2026-03-01T12:00:00.000Z');

    function createLogAppend(): LogAppendStrategy {
      return new LogAppendStrategy({
        fileSystem,
        logFile: '.api_validation_overrides.log',
        now: () => timestamp,
      });
    }

    it('should append a timestamped block to the log', async () => {
      const result = await createLogAppend().attempt(context);

      const logPath = `${REPO}/.api_validation_overrides.log`;
      expect(fileSystem.getFile(logPath)).toBe(
        `\n${RULE}\nTimestamp: 2026-03-01T12:00:00.000Z\n${RULE}${context.appendix}\n`
      );
      expect(result).toEqual({ filePath: logPath });
    });

    it('should keep earlier blocks', async () => {
      await createLogAppend().attempt(context);
      await createLogAppend().attempt(context);

      const content = fileSystem.getFile(`${REPO}/.api_validation_overrides.log`) ?? '';
      expect(content.split('Timestamp: ')).toHaveLength(3);
    });
  });
});
