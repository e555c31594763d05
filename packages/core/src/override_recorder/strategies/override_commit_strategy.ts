import * as path from 'path';
import type { IGitModule } from '../../git/types';
import type { Logger } from '../../logger/logger';
import type {
  OverrideFileSystem,
  OverrideStrategy,
  StrategyContext,
  StrategySuccess,
} from '../override_recorder.types';
import { buildOverrideCommitMessage, buildSentinelContent } from '../appendix';

export type OverrideCommitStrategyDependencies = {
  git: IGitModule;
  fileSystem: OverrideFileSystem;
  sentinelFile: string;
  commitBanner: string;
  logger: Logger;
};

/**
 * Tier 2: commit a sentinel file carrying the override record.
 *
 * The commit carries the sentinel only; paths the user staged beforehand stay
 * staged and out of it. The sentinel is overwritten on every run. If staging
 * or committing fails the written file stays in the working tree.
 */
export class OverrideCommitStrategy implements OverrideStrategy {
  readonly tier = 'override-commit' as const;

  constructor(private readonly deps: OverrideCommitStrategyDependencies) {}

  async attempt(context: StrategyContext): Promise<StrategySuccess> {
    const { git, fileSystem, sentinelFile, commitBanner, logger } = this.deps;
    const sentinelPath = path.join(context.repoRoot, sentinelFile);

    await fileSystem.writeFile(sentinelPath, buildSentinelContent(context.appendix));
    await git.add([sentinelFile]);
    await git.commit(buildOverrideCommitMessage(commitBanner, context.appendix), [sentinelFile]);

    try {
      return { commitHash: await git.getLastCommitHash(), filePath: sentinelPath };
    } catch (error) {
      // the override commit exists; only the follow-up hash read failed
      logger.debug(`Override commit hash unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return { filePath: sentinelPath };
    }
  }
}
