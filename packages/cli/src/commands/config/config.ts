import { Command } from 'commander';
import { ConfigCommand } from './config-command';

/**
 * Register the config command
 */
export function registerConfigCommand(program: Command): void {
  const configCommand = new ConfigCommand();
  configCommand.register(program);
}
