import { Command } from 'commander';
import { Config } from '@pushgate/core';
import { BaseCommand } from '../../base/base-command';
import type { RepositoryCommandOptions } from '../../interfaces/command';

export type ConfigAction = 'show' | 'init';

const CONFIG_ACTIONS: readonly ConfigAction[] = ['show', 'init'];

function isConfigAction(value: string): value is ConfigAction {
  return (CONFIG_ACTIONS as readonly string[]).includes(value);
}

export interface ConfigCommandOptions extends RepositoryCommandOptions {
  action: string;
  /** Overwrite an existing pushgate.yaml on init */
  force?: boolean;
}

/**
 * Config Command - shows the effective configuration or writes the default one
 */
export class ConfigCommand extends BaseCommand<ConfigCommandOptions> {
  protected commandName = 'config';
  protected description = 'Show the effective configuration or write the default pushgate.yaml';

  register(program: Command): void {
    program
      .command(`${this.commandName} <action>`)
      .description(this.description)
      .option('--repo <path>', 'Repository root (default: git top level of the current directory)')
      .option('--config <path>', 'Config file to show (default: discovered from the repository root)')
      .option('-f, --force', 'Overwrite an existing pushgate.yaml on init')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on errors')
      .option('-q, --quiet', 'Suppress output except errors')
      .action(async (action: string, options: Omit<ConfigCommandOptions, 'action'>) => {
        await this.execute({ ...options, action });
      });
  }

  async execute(options: ConfigCommandOptions): Promise<void> {
    if (!isConfigAction(options.action)) {
      this.handleError(`Unknown config action: ${options.action} (expected ${CONFIG_ACTIONS.join(' or ')})`, options);
      return;
    }

    try {
      this.container.configure({
        ...(options.repo ? { repo: options.repo } : {}),
        ...(options.config ? { config: options.config } : {}),
      });
      const manager = await this.container.getConfigManager();

      if (options.action === 'init') {
        const written = await manager.saveDefaultConfig({ force: options.force ?? false });
        this.handleSuccess({ path: written }, options, `Wrote default configuration to ${written}`);
        return;
      }

      const { config, source } = await manager.loadConfig();
      if (options.json) {
        this.handleSuccess({ source, config }, options);
        return;
      }

      console.log(`# source: ${source ?? 'built-in defaults'}`);
      console.log(Config.serializeConfig(config).trimEnd());
    } catch (error) {
      if (error instanceof Config.ConfigError) {
        this.handleError(error.message, options, error);
        return;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.handleError(`Config command failed: ${reason}`, options, error instanceof Error ? error : undefined);
    }
  }
}
