import { Command } from 'commander';
import type { Inspector } from '@pushgate/core';
import { BaseCommand } from '../../base/base-command';
import type { RepositoryCommandOptions } from '../../interfaces/command';

export type InspectCommandOptions = RepositoryCommandOptions;

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

/**
 * Renders the repository state the way the override tiers see it
 */
export function formatRepositoryState(repoRoot: string, state: Inspector.RepositoryState): string[] {
  const lines = [
    `📍 Repository: ${repoRoot}`,
    `   Git repository: ${yesNo(state.isRepository)}`,
    `   Working tree:   ${state.workingTree}`,
    `   Has commits:    ${yesNo(state.hasAtLeastOneCommit)}`,
    `   Branch:         ${state.currentBranch ?? '(detached or unknown)'}`,
  ];

  if (state.lastCommitHash) {
    const subject = state.lastCommitMessage?.split('\n')[0] ?? '';
    lines.push(`   Last commit:    ${state.lastCommitHash.slice(0, 7)} ${subject}`.trimEnd());
  }

  return lines;
}

/**
 * Inspect Command - prints the repository state used by the override tiers
 */
export class InspectCommand extends BaseCommand<InspectCommandOptions> {
  protected commandName = 'inspect';
  protected description = 'Show the repository state that decides which override tier applies';

  register(program: Command): void {
    program
      .command(this.commandName)
      .description(this.description)
      .option('--repo <path>', 'Repository root (default: git top level of the current directory)')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on errors')
      .action(async (options: InspectCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: InspectCommandOptions): Promise<void> {
    try {
      this.container.configure(options.repo ? { repo: options.repo } : {});

      const repoRoot = await this.container.getRepoRoot();
      const inspector = await this.container.getInspector();
      const state = await inspector.getState();

      if (options.json) {
        this.handleSuccess({ repoRoot, ...state }, options);
        return;
      }

      formatRepositoryState(repoRoot, state).forEach((line) => console.log(line));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.handleError(`Inspect command failed: ${reason}`, options, error instanceof Error ? error : undefined);
    }
  }
}
