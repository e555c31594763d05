import { Command } from 'commander';
import { Logger } from '@pushgate/core';
import type { Override } from '@pushgate/core';
import { BaseCommand } from '../../base/base-command';
import type { RepositoryCommandOptions } from '../../interfaces/command';

/**
 * Override Command Options
 */
export interface OverrideCommandOptions extends RepositoryCommandOptions {
  /** Why the push goes ahead despite failing validation */
  justification: string;
  /** Validation errors, one per --error flag */
  error?: string[];
  /** Validation warnings, one per --warning flag */
  warning?: string[];
}

const TIER_NAMES: Record<Override.OverrideTier, string> = {
  'amend': 'amended last commit',
  'override-commit': 'override commit',
  'log-append': 'override log',
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function formatAttempt(attempt: Override.TierAttempt): string {
  const reason = attempt.reason ? ` (${attempt.reason})` : '';
  return `   • ${attempt.tier}: ${attempt.outcome}${reason}`;
}

/**
 * Override Command - records a validation override in the repository
 *
 * Thin wrapper around OverrideRecorder: resolves repository and config,
 * picks the recorder log level from the output mode, prints the tier that
 * recorded the override and sets the exit code.
 */
export class OverrideCommand extends BaseCommand<OverrideCommandOptions> {
  protected commandName = 'override';
  protected description = 'Record that a push went ahead despite failing validation';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .requiredOption('-j, --justification <text>', 'Why validation is being overridden')
      .option('-e, --error <message>', 'Validation error to record (repeatable)', collect, [])
      .option('-w, --warning <message>', 'Validation warning to record (repeatable)', collect, [])
      .option('--repo <path>', 'Repository root (default: git top level of the current directory)')
      .option('--config <path>', 'Config file (default: discovered from the repository root)')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Log every tier attempt')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (options: OverrideCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: OverrideCommandOptions): Promise<void> {
    let effective: OverrideCommandOptions = options;

    try {
      this.container.configure({
        ...(options.repo ? { repo: options.repo } : {}),
        ...(options.config ? { config: options.config } : {}),
      });

      // config output settings apply only where no flag was given
      const { config } = await (await this.container.getConfigManager()).loadConfig();
      effective = {
        ...options,
        json: options.json ?? config.output.format === 'json',
        verbose: options.verbose ?? config.output.verbose,
      };

      const recorder = await this.container.getOverrideRecorder(
        Logger.createLogger('[OverrideRecorder] ', this.recorderLogLevel(effective))
      );

      const result = await recorder.recordOverride(
        effective.justification,
        effective.error ?? [],
        effective.warning ?? []
      );

      if (!result.success) {
        const headline = 'Could not record the override: every tier failed';
        const message = effective.json
          ? headline
          : [headline, ...result.attempts.map(formatAttempt)].join('\n');
        this.handleError(message, effective, undefined, 1, { attempts: result.attempts });
        return;
      }

      this.handleSuccess(result, effective, `Override recorded via ${TIER_NAMES[result.tier]}`);

      if (!effective.json && !effective.quiet) {
        if (result.commitHash) {
          console.log(`   Commit: ${result.commitHash}`);
        }
        if (result.filePath) {
          console.log(`   File:   ${result.filePath}`);
        }
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.handleError(
        `Override command failed: ${reason}`,
        effective,
        error instanceof Error ? error : undefined
      );
    }
  }

  private recorderLogLevel(options: OverrideCommandOptions): Logger.LogLevel {
    if (options.json || options.quiet) {
      return 'silent';
    }
    return options.verbose ? 'debug' : 'warn';
  }
}
