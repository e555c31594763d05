import * as path from 'path';
import type {
  OverrideFileSystem,
  OverrideStrategy,
  StrategyContext,
  StrategySuccess,
} from '../override_recorder.types';
import { buildLogBlock } from '../appendix';

export type LogAppendStrategyDependencies = {
  fileSystem: OverrideFileSystem;
  logFile: string;
  now: () => Date;
};

/**
 * Tier 3: append a timestamped block to the local override log.
 * Last resort; there is nothing after it.
 */
export class LogAppendStrategy implements OverrideStrategy {
  readonly tier = 'log-append' as const;

  constructor(private readonly deps: LogAppendStrategyDependencies) {}

  async attempt(context: StrategyContext): Promise<StrategySuccess> {
    const { fileSystem, logFile, now } = this.deps;
    const logPath = path.join(context.repoRoot, logFile);

    await fileSystem.appendFile(logPath, buildLogBlock(context.appendix, now().toISOString()));

    return { filePath: logPath };
  }
}
