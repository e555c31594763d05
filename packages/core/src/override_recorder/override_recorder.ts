/**
 * OverrideRecorder - durable record of a validation override
 *
 * Records that a push went ahead despite failing validation, trying three
 * tiers in strict order and stopping at the first that succeeds:
 *
 * 1. amend          - append the record to the last commit message
 * 2. override-commit - commit a sentinel file carrying the record
 * 3. log-append     - append a timestamped block to a local log file
 *
 * Each tier runs at most once per call. A tier that is not eligible is
 * skipped; a tier that fails hands over to the next one. Only the failure of
 * the last tier makes the whole call fail.
 *
 * @example
 * ```typescript
 * const recorder = new OverrideRecorder({
 *   git: new LocalGitModule({ repoRoot, execCommand }),
 *   fileSystem: new FsOverrideFileSystem(),
 * });
 * const result = await recorder.recordOverride('hotfix, reviewed offline', ['missing field: user_id'], []);
 * if (result.success) console.log(result.tier);
 * ```
 */

import type { IGitModule } from '../git/types';
import { RepositoryInspector } from '../repository_inspector';
import type { IRepositoryInspector } from '../repository_inspector';
import { createLogger } from '../logger/logger';
import type { Logger } from '../logger/logger';
import type {
  OverrideRecord,
  OverrideRecorderDependencies,
  OverrideRecorderOptions,
  OverrideResult,
  OverrideStrategy,
  OverrideTier,
  StrategyContext,
  TierAttempt,
} from './override_recorder.types';
import { buildRecordAppendix } from './appendix';
import { PreconditionFailedError } from './errors';
import { AmendStrategy, OverrideCommitStrategy, LogAppendStrategy } from './strategies';

export const DEFAULT_OVERRIDE_OPTIONS: Readonly<OverrideRecorderOptions> = Object.freeze({
  sentinelFile: '.validation_override',
  logFile: '.api_validation_overrides.log',
  commitBanner: 'API Validation Override Record',
  treatUnknownTreeAsClean: false,
});

const TIER_LABELS: Record<OverrideTier, string> = {
  'amend': 'Amend last commit',
  'override-commit': 'Override commit',
  'log-append': 'Override log',
};

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createOverrideRecord(
  justification: string,
  errors: readonly string[],
  warnings: readonly string[]
): OverrideRecord {
  return Object.freeze({
    justification,
    errors: Object.freeze([...errors]),
    warnings: Object.freeze([...warnings]),
  });
}

export class OverrideRecorder {
  private readonly git: IGitModule;
  private readonly strategies: readonly OverrideStrategy[];
  private readonly logger: Logger;
  readonly options: Readonly<OverrideRecorderOptions>;

  constructor(dependencies: OverrideRecorderDependencies) {
    this.git = dependencies.git;
    this.logger = dependencies.logger ?? createLogger('[OverrideRecorder] ');
    this.options = { ...DEFAULT_OVERRIDE_OPTIONS, ...dependencies.options };

    const inspector: IRepositoryInspector =
      dependencies.inspector ?? new RepositoryInspector({ git: dependencies.git });

    this.strategies = dependencies.strategies ?? [
      new AmendStrategy({
        git: this.git,
        inspector,
        fileSystem: dependencies.fileSystem,
        logger: this.logger,
        treatUnknownTreeAsClean: this.options.treatUnknownTreeAsClean,
      }),
      new OverrideCommitStrategy({
        git: this.git,
        fileSystem: dependencies.fileSystem,
        sentinelFile: this.options.sentinelFile,
        commitBanner: this.options.commitBanner,
        logger: this.logger,
      }),
      new LogAppendStrategy({
        fileSystem: dependencies.fileSystem,
        logFile: this.options.logFile,
        now: dependencies.now ?? (() => new Date()),
      }),
    ];
  }

  /**
   * Records an override, returning which tier recorded it.
   *
   * Never rejects: every tier error is turned into an attempt entry. When the
   * repository root cannot be resolved no tier runs and all are reported as
   * skipped.
   */
  async recordOverride(
    justification: string,
    errors: readonly string[],
    warnings: readonly string[]
  ): Promise<OverrideResult> {
    const record = createOverrideRecord(justification, errors, warnings);
    let repoRoot: string;
    try {
      repoRoot = await this.git.getRepoRoot();
    } catch (error) {
      const reason = `repository root could not be resolved: ${describeError(error)}`;
      this.logger.error(`❌ Could not record the override: ${reason}`);
      return {
        success: false,
        attempts: this.strategies.map((strategy) => ({ tier: strategy.tier, outcome: 'skipped', reason })),
      };
    }

    const context: StrategyContext = {
      record,
      appendix: buildRecordAppendix(record),
      repoRoot,
    };
    const attempts: TierAttempt[] = [];

    for (const strategy of this.strategies) {
      const label = TIER_LABELS[strategy.tier];

      try {
        const outcome = await strategy.attempt(context);
        attempts.push({ tier: strategy.tier, outcome: 'succeeded' });
        this.logger.info(`✅ ${label}: override recorded`);
        return { success: true, tier: strategy.tier, attempts, ...outcome };
      } catch (error) {
        if (error instanceof PreconditionFailedError) {
          attempts.push({ tier: strategy.tier, outcome: 'skipped', reason: error.reason });
          this.logger.info(`⏭️  ${label} skipped: ${error.reason}`);
        } else {
          const reason = describeError(error);
          attempts.push({ tier: strategy.tier, outcome: 'failed', reason });
          this.logger.warn(`⚠️  ${label} failed: ${reason}`);
        }
      }
    }

    this.logger.error('❌ Could not record the override: every tier failed');
    return { success: false, attempts };
  }
}
