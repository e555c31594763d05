import type { IGitModule } from '../../git/types';
import type { IRepositoryInspector } from '../../repository_inspector';
import type { Logger } from '../../logger/logger';
import type {
  OverrideFileSystem,
  OverrideStrategy,
  StrategyContext,
  StrategySuccess,
} from '../override_recorder.types';
import { PreconditionFailedError } from '../errors';

export type AmendStrategyDependencies = {
  git: IGitModule;
  inspector: IRepositoryInspector;
  fileSystem: OverrideFileSystem;
  logger: Logger;
  treatUnknownTreeAsClean: boolean;
};

/**
 * Tier 1: append the override to the message of the last commit.
 *
 * Eligible only on a clean working tree with at least one commit, since an
 * amend would otherwise sweep staged changes into the commit. The check and
 * the amend are not atomic; a concurrent change in between is not detected.
 */
export class AmendStrategy implements OverrideStrategy {
  readonly tier = 'amend' as const;

  constructor(private readonly deps: AmendStrategyDependencies) {}

  private async checkPreconditions(): Promise<void> {
    const { inspector, treatUnknownTreeAsClean } = this.deps;
    const tree = await inspector.getWorkingTreeStatus();

    if (tree === 'dirty') {
      throw new PreconditionFailedError('working tree has uncommitted changes');
    }
    if (tree === 'unknown' && !treatUnknownTreeAsClean) {
      throw new PreconditionFailedError('working tree status could not be read');
    }
    if (!(await inspector.hasCommits())) {
      throw new PreconditionFailedError('repository has no commits');
    }
  }

  async attempt(context: StrategyContext): Promise<StrategySuccess> {
    await this.checkPreconditions();

    const { git, inspector, fileSystem, logger } = this.deps;
    const currentMessage = await inspector.getLastCommitMessage();
    const scratchPath = await fileSystem.createTempFile(currentMessage + context.appendix);

    try {
      await git.amendLastCommitMessage(scratchPath);
    } finally {
      await fileSystem.removeTempFile(scratchPath).catch((error: unknown) => {
        logger.warn(`Could not remove scratch file ${scratchPath}: ${error instanceof Error ? error.message : String(error)}`);
      });
    }

    try {
      return { commitHash: await inspector.getLastCommitHash() };
    } catch (error) {
      // the amend itself went through; only the follow-up hash read failed
      logger.debug(`Amended commit hash unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return {};
    }
  }
}
